import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { PersistenceError, RemoteError, SyncConflictError, TransportError, ValidationError } from '../errors.js';
import { PatientModel, type PatientModelDeps } from '../PatientModel.js';
import { contactPoint } from '../patientMapping.js';
import { InMemoryPatientStore } from '../store/InMemoryPatientStore.js';
import type { CompletionCallback, LocalPatientRecord, Patient, PatientRemote } from '../types.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

const JANE: Patient = {
    resourceType: 'Patient',
    name: [{ given: ['Jane'], family: 'Doe' }],
    birthDate: '1990-01-01',
    gender: 'female',
};

class FailingStore extends InMemoryPatientStore {
    failWrites = false;

    upsert(record: LocalPatientRecord): void {
        if (this.failWrites) throw new Error('disk full');
        super.upsert(record);
    }
}

class ForgetfulStore extends InMemoryPatientStore {
    forget = false;

    get(localKey: string): LocalPatientRecord | null {
        return this.forget ? null : super.get(localKey);
    }
}

function fakeRemote() {
    return {
        findByFamilyName: vi.fn<PatientRemote['findByFamilyName']>(),
        create: vi.fn<PatientRemote['create']>(),
        update: vi.fn<PatientRemote['update']>(),
        fetchById: vi.fn<PatientRemote['fetchById']>(),
    };
}

function createHarness(store: InMemoryPatientStore = new InMemoryPatientStore()) {
    const remote = fakeRemote();
    let counter = 0;
    const newLocalKey = vi.fn(() => `local-${++counter}`);
    const deps: PatientModelDeps = { store, remote, now: () => NOW, newLocalKey };
    return { store, remote, newLocalKey, deps };
}

function fillJane(model: PatientModel): void {
    model.givenName = 'Jane';
    model.familyName = 'Doe';
    model.birthDate = '1990-01-01';
    model.gender = 'female';
}

function deferred<T>() {
    const handlers: { resolve: (value: T) => void } = { resolve: () => undefined };
    const promise = new Promise<T>(resolve => { handlers.resolve = resolve; });
    return { promise, resolve: (value: T) => handlers.resolve(value) };
}

function permutations<T>(items: T[]): T[][] {
    if (items.length <= 1) return [items];
    return items.flatMap((item, i) =>
        permutations([...items.slice(0, i), ...items.slice(i + 1)]).map(rest => [item, ...rest]));
}

function syncedRecord(overrides: Partial<LocalPatientRecord> = {}): LocalPatientRecord {
    return {
        localKey: 'cached',
        serverId: '42',
        resource: { ...JANE, id: '42', meta: { versionId: '3' } },
        version: 3,
        updatedAt: '2024-04-01T00:00:00.000Z',
        ...overrides,
    };
}

describe('PatientModel', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('draft and canSave', () => {
        it('starts blank', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);

            expect(model.state).toEqual({ kind: 'new' });
            expect(model.draft).toEqual({ telecom: [], photo: undefined });
            expect(model.canSave).toBe(false);
            expect(model.canUpload).toBe(false);
            expect(model.canDownload).toBe(false);
            expect(model.reference).toBeNull();
        });

        it('becomes saveable only once all four required fields are set, in any order', () => {
            const setters: Array<(model: PatientModel) => void> = [
                model => { model.givenName = 'Jane'; },
                model => { model.familyName = 'Doe'; },
                model => { model.birthDate = '1990-01-01'; },
                model => { model.gender = 'female'; },
            ];
            const { deps } = createHarness();

            for (const order of permutations(setters)) {
                const model = new PatientModel(deps);
                order.forEach((set, index) => {
                    set(model);
                    expect(model.canSave).toBe(index === setters.length - 1);
                });
            }
        });

        it('treats whitespace-only names as missing', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);

            model.givenName = '   ';
            expect(model.canSave).toBe(false);
            model.givenName = ' Jane ';
            expect(model.canSave).toBe(true);
            model.familyName = '';
            expect(model.canSave).toBe(false);
        });

        it('treats an empty birth date as missing', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);

            model.birthDate = '';
            expect(model.canSave).toBe(false);
            model.birthDate = '  ';
            expect(model.canSave).toBe(false);
            expect(model.save()).toBe(false);
        });

        it('reports canSave to listeners until they unsubscribe', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);
            const listener = vi.fn<(canSave: boolean) => void>();
            const unsubscribe = model.onCanSaveChanged(listener);

            fillJane(model);
            expect(listener.mock.calls).toEqual([[false], [false], [false], [true]]);

            unsubscribe();
            model.givenName = undefined;
            expect(listener).toHaveBeenCalledTimes(4);
            expect(model.canSave).toBe(false);
        });

        it('applies several changes at once', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);

            const canSave = model.update({ givenName: 'Jane', familyName: 'Doe', birthDate: '1990-01-01', gender: 'male' });

            expect(canSave).toBe(true);
            expect(model.gender).toBe('male');
        });

        it('hands out copies of the contact list', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);
            model.telecom = [contactPoint('phone', '555-0100')];

            const copy = model.telecom;
            copy.push(contactPoint('email', 'jane@example.test'));

            expect(model.telecom).toEqual([{ system: 'phone', value: '555-0100' }]);
        });
    });

    describe('save', () => {
        it('writes nothing while required fields are missing', () => {
            const { deps, store, newLocalKey } = createHarness();
            const model = new PatientModel(deps);
            model.givenName = 'Jane';

            expect(model.save()).toBe(false);
            expect(store.list()).toEqual([]);
            expect(newLocalKey).not.toHaveBeenCalled();
        });

        it('creates a local record without a server id on first save', () => {
            const { deps, store } = createHarness();
            const model = new PatientModel(deps);
            const updated = vi.fn<(record: LocalPatientRecord) => void>();
            model.onPatientUpdated(updated);
            fillJane(model);

            expect(model.save()).toBe(true);

            const expected: LocalPatientRecord = {
                localKey: 'local-1',
                serverId: null,
                resource: JANE,
                version: 1,
                updatedAt: '2024-05-01T12:00:00.000Z',
            };
            expect(store.get('local-1')).toEqual(expected);
            expect(updated).toHaveBeenCalledWith(expected);
            expect(model.state).toEqual({ kind: 'savedLocal', localKey: 'local-1' });
            expect(model.canUpload).toBe(true);
            expect(model.canDownload).toBe(false);
        });

        it('is idempotent when nothing changed', () => {
            const { deps, store, newLocalKey } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            const first = store.get('local-1');

            expect(model.save()).toBe(true);

            expect(store.get('local-1')).toEqual(first);
            expect(store.list()).toHaveLength(1);
            expect(model.localKey).toBe('local-1');
            expect(newLocalKey).toHaveBeenCalledTimes(1);
        });

        it('overwrites the same record on later saves', () => {
            const { deps, store } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();

            model.givenName = 'Janet';
            model.save();

            expect(store.list()).toHaveLength(1);
            expect(store.get('local-1')?.version).toBe(2);
            expect(store.get('local-1')?.resource.name).toEqual([{ given: ['Janet'], family: 'Doe' }]);
        });

        it('keeps fields of the stored resource the draft does not edit', () => {
            const { deps, store } = createHarness();
            store.upsert(syncedRecord({
                resource: { ...JANE, id: '42', identifier: [{ system: 'urn:example:mrn', value: 'MRN-1' }] },
            }));
            const model = new PatientModel(deps);
            model.open('cached');

            model.birthDate = '1990-02-02';
            model.save();

            expect(store.get('cached')).toMatchObject({
                serverId: '42',
                version: 4,
                resource: {
                    id: '42',
                    birthDate: '1990-02-02',
                    identifier: [{ system: 'urn:example:mrn', value: 'MRN-1' }],
                },
            });
        });

        it('stores a search hit under its server id and writes an unrecognized gender as unknown', () => {
            const { deps, store } = createHarness();
            const model = new PatientModel(deps, { ...JANE, id: '42', gender: 'nonbinary' });
            expect(model.gender).toBe('unknown');

            model.save();

            expect(store.get('local-1')).toMatchObject({ serverId: '42', resource: { id: '42', gender: 'unknown' } });
            expect(model.state).toEqual({ kind: 'synced', serverId: '42', localKey: 'local-1' });
        });

        it('keeps a linked photo and a list-valued family name it never edited', () => {
            const { deps, store } = createHarness();
            const model = new PatientModel(deps, {
                ...JANE,
                id: '42',
                name: [{ given: ['Jane'], family: ['Doe', 'Smith'] }],
                photo: [{ url: 'http://images.test/p.jpg', contentType: 'image/jpeg' }],
            });

            expect(model.save()).toBe(true);

            const saved = store.get('local-1')?.resource;
            expect(saved?.name).toEqual([{ given: ['Jane'], family: ['Doe', 'Smith'] }]);
            expect(saved?.photo).toEqual([{ url: 'http://images.test/p.jpg', contentType: 'image/jpeg' }]);
        });

        it('throws PersistenceError and stays unsaved when the store fails', () => {
            const store = new FailingStore();
            const { deps } = createHarness(store);
            const model = new PatientModel(deps);
            fillJane(model);
            store.failWrites = true;

            expect(() => model.save()).toThrow(PersistenceError);
            expect(model.state).toEqual({ kind: 'new' });
            expect(model.localKey).toBeNull();
        });
    });

    describe('initialize and open', () => {
        it('loads a stored record', () => {
            const { deps, store } = createHarness();
            store.upsert(syncedRecord());
            const model = new PatientModel(deps);

            model.open('cached');

            expect(model.state).toEqual({ kind: 'synced', serverId: '42', localKey: 'cached' });
            expect(model.givenName).toBe('Jane');
            expect(model.canSave).toBe(true);
            expect(model.canUpload).toBe(true);
            expect(model.reference).toEqual({ reference: 'Patient/42' });
        });

        it('rejects an unknown local key', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);

            expect(() => model.open('missing')).toThrow(ValidationError);
        });

        it('can download but not upload a patient known only by server id', () => {
            const { deps, remote } = createHarness();
            const model = new PatientModel(deps, { resourceType: 'Patient', id: '42' });

            expect(model.canDownload).toBe(true);
            expect(model.canUpload).toBe(false);
            expect(() => model.upload()).toThrow(ValidationError);
            expect(remote.create).not.toHaveBeenCalled();
            expect(remote.update).not.toHaveBeenCalled();
        });

        it('picks up the local key of a cached server id', () => {
            const { deps, store } = createHarness();
            store.upsert(syncedRecord());

            const model = new PatientModel(deps, { resourceType: 'Patient', id: '42' });

            expect(model.localKey).toBe('cached');
            expect(model.canUpload).toBe(true);
        });

        it('resets to a blank draft', () => {
            const { deps } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();

            model.initialize();

            expect(model.state).toEqual({ kind: 'new' });
            expect(model.givenName).toBeUndefined();
            expect(model.canSave).toBe(false);
        });
    });

    describe('upload', () => {
        it('refuses to run before the patient is saved', () => {
            const { deps, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);

            expect(model.canUpload).toBe(false);
            expect(() => model.upload()).toThrow(ValidationError);
            expect(remote.create).not.toHaveBeenCalled();
            expect(remote.update).not.toHaveBeenCalled();
        });

        it('creates a new patient and adopts the server id', async () => {
            const { deps, store, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            const created: Patient = { ...JANE, id: '42', meta: { versionId: '1' } };
            remote.create.mockResolvedValueOnce(created);
            const onComplete = vi.fn<CompletionCallback>();

            await model.upload(onComplete);

            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(onComplete).toHaveBeenCalledWith(null);
            expect(remote.create).toHaveBeenCalledTimes(1);
            expect(remote.create).toHaveBeenCalledWith(JANE);
            expect(remote.create.mock.calls[0][0]).not.toHaveProperty('id');
            expect(remote.update).not.toHaveBeenCalled();
            expect(store.get('local-1')).toEqual({
                localKey: 'local-1',
                serverId: '42',
                resource: created,
                version: 2,
                updatedAt: '2024-05-01T12:00:00.000Z',
            });
            expect(model.state).toEqual({ kind: 'synced', serverId: '42', localKey: 'local-1' });
            expect(model.canDownload).toBe(true);
            expect(model.reference).toEqual({ reference: 'Patient/42' });
        });

        it('updates the exact server id once the patient has one', async () => {
            const { deps, store, remote } = createHarness();
            store.upsert(syncedRecord());
            const model = new PatientModel(deps);
            model.open('cached');
            model.familyName = 'Doe-Smith';
            model.save();
            remote.update.mockResolvedValueOnce({ ...JANE, id: '42', name: [{ given: ['Jane'], family: 'Doe-Smith' }] });

            await model.upload();

            expect(remote.create).not.toHaveBeenCalled();
            expect(remote.update).toHaveBeenCalledTimes(1);
            const [id, sent] = remote.update.mock.calls[0];
            expect(id).toBe('42');
            expect(sent.name).toEqual([{ given: ['Jane'], family: 'Doe-Smith' }]);
        });

        it('takes the server representation into the draft', async () => {
            const { deps, store, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            const normalized: Patient = { ...JANE, id: '42', active: true, name: [{ given: ['JANE'], family: 'DOE' }] };
            remote.create.mockResolvedValueOnce(normalized);

            await model.upload();

            expect(model.givenName).toBe('JANE');
            expect(model.familyName).toBe('DOE');
            expect(store.get('local-1')?.resource).toEqual(normalized);
        });

        it('reports a server failure and leaves everything as it was', async () => {
            const { deps, store, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            const saved = store.get('local-1');
            const failure = new RemoteError(500, 'boom');
            remote.create.mockRejectedValueOnce(failure);
            const onComplete = vi.fn<CompletionCallback>();

            await expect(model.upload(onComplete)).resolves.toBeUndefined();

            expect(onComplete).toHaveBeenCalledTimes(1);
            expect(onComplete).toHaveBeenCalledWith(failure);
            expect(store.get('local-1')).toEqual(saved);
            expect(model.state).toEqual({ kind: 'savedLocal', localKey: 'local-1' });
        });

        it('reports PersistenceError when the record cannot be written afterwards', async () => {
            const store = new FailingStore();
            const { deps, remote } = createHarness(store);
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            remote.create.mockResolvedValueOnce({ ...JANE, id: '42' });
            store.failWrites = true;
            const onComplete = vi.fn<CompletionCallback>();

            await model.upload(onComplete);

            const error = onComplete.mock.calls[0][0];
            expect(error).toBeInstanceOf(PersistenceError);
            expect(error?.message).toBe('Failed to persist local record local-1 after upload: disk full');
            expect(store.get('local-1')).toMatchObject({ serverId: null, version: 1 });
            expect(model.serverId).toBeNull();
        });

        it('reports RemoteError when the server answers without an id', async () => {
            const { deps, store, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            remote.create.mockResolvedValueOnce({ resourceType: 'Patient' });
            const onComplete = vi.fn<CompletionCallback>();

            await model.upload(onComplete);

            const error = onComplete.mock.calls[0][0];
            expect(error).toBeInstanceOf(RemoteError);
            expect(error).toMatchObject({ status: 0, body: '{"resourceType":"Patient"}' });
            expect(store.get('local-1')).toMatchObject({ serverId: null, version: 1 });
            expect(model.state).toEqual({ kind: 'savedLocal', localKey: 'local-1' });
        });

        it('reports PersistenceError when the record is gone by the time the upload runs', async () => {
            const store = new ForgetfulStore();
            const { deps, remote } = createHarness(store);
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            const onComplete = vi.fn<CompletionCallback>();

            const upload = model.upload(onComplete);
            store.forget = true;
            await upload;

            const error = onComplete.mock.calls[0][0];
            expect(error).toBeInstanceOf(PersistenceError);
            expect(error?.message).toBe('Local record local-1 disappeared before upload');
            expect(remote.create).not.toHaveBeenCalled();
        });

        it('runs back-to-back uploads one after the other', async () => {
            const { deps, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            remote.create.mockResolvedValueOnce({ ...JANE, id: '42', meta: { versionId: '1' } });
            remote.update.mockResolvedValueOnce({ ...JANE, id: '42', meta: { versionId: '2' } });

            await Promise.all([model.upload(), model.upload()]);

            expect(remote.create).toHaveBeenCalledTimes(1);
            expect(remote.update).toHaveBeenCalledTimes(1);
            expect(remote.update.mock.calls[0][0]).toBe('42');
        });

        it('keeps a save made during the upload and adopts the server id', async () => {
            const { deps, store, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();
            const pending = deferred<Patient>();
            remote.create.mockReturnValueOnce(pending.promise);
            const onComplete = vi.fn<CompletionCallback>();

            const upload = model.upload(onComplete);
            await vi.waitFor(() => expect(remote.create).toHaveBeenCalledTimes(1));
            model.givenName = 'Janet';
            model.save();
            pending.resolve({ ...JANE, id: '42', meta: { versionId: '1' } });
            await upload;

            expect(onComplete).toHaveBeenCalledWith(null);
            expect(model.givenName).toBe('Janet');
            expect(store.get('local-1')).toEqual({
                localKey: 'local-1',
                serverId: '42',
                resource: { ...JANE, name: [{ given: ['Janet'], family: 'Doe' }], id: '42', meta: { versionId: '1' } },
                version: 3,
                updatedAt: '2024-05-01T12:00:00.000Z',
            });
            expect(model.serverId).toBe('42');
        });
    });

    describe('download', () => {
        it('refuses to run without a server id', () => {
            const { deps, remote } = createHarness();
            const model = new PatientModel(deps);
            fillJane(model);
            model.save();

            expect(model.canDownload).toBe(false);
            expect(() => model.download()).toThrow(ValidationError);
            expect(remote.fetchById).not.toHaveBeenCalled();
        });

        it('stores a patient known only by server id under a new local key', async () => {
            const { deps, store, remote } = createHarness();
            const model = new PatientModel(deps, { resourceType: 'Patient', id: '42' });
            const serverCopy: Patient = { ...JANE, id: '42', meta: { versionId: '5' } };
            remote.fetchById.mockResolvedValueOnce(serverCopy);
            const onComplete = vi.fn<CompletionCallback>();

            await model.download(onComplete);

            expect(onComplete).toHaveBeenCalledWith(null);
            expect(remote.fetchById).toHaveBeenCalledWith('42');
            expect(store.get('local-1')).toEqual({
                localKey: 'local-1',
                serverId: '42',
                resource: serverCopy,
                version: 1,
                updatedAt: '2024-05-01T12:00:00.000Z',
            });
            expect(model.givenName).toBe('Jane');
            expect(model.canUpload).toBe(true);
        });

        it('replaces the draft and the stored record with the server copy', async () => {
            const { deps, store, remote } = createHarness();
            store.upsert(syncedRecord());
            const model = new PatientModel(deps);
            model.open('cached');
            model.givenName = 'Unsaved edit';
            const serverCopy: Patient = {
                ...JANE,
                id: '42',
                name: [{ given: ['Janet'], family: 'Doe' }],
                telecom: [{ system: 'phone', value: '555-0199' }],
            };
            remote.fetchById.mockResolvedValueOnce(serverCopy);

            await model.download();

            expect(model.givenName).toBe('Janet');
            expect(model.telecom).toEqual([{ system: 'phone', value: '555-0199' }]);
            expect(store.get('cached')).toMatchObject({ version: 4, resource: serverCopy });
        });

        it('reports a transport failure and changes nothing', async () => {
            const { deps, store, remote } = createHarness();
            store.upsert(syncedRecord());
            const model = new PatientModel(deps);
            model.open('cached');
            const failure = new TransportError('GET failed', new Error('socket hang up'));
            remote.fetchById.mockRejectedValueOnce(failure);
            const onComplete = vi.fn<CompletionCallback>();

            await model.download(onComplete);

            expect(onComplete).toHaveBeenCalledWith(failure);
            expect(store.get('cached')).toEqual(syncedRecord());
            expect(model.givenName).toBe('Jane');
            expect(model.state).toEqual({ kind: 'synced', serverId: '42', localKey: 'cached' });
        });

        it('reports PersistenceError when the downloaded copy cannot be stored', async () => {
            const store = new FailingStore();
            const { deps, remote } = createHarness(store);
            store.upsert(syncedRecord());
            const model = new PatientModel(deps);
            model.open('cached');
            remote.fetchById.mockResolvedValueOnce({ ...JANE, id: '42', name: [{ given: ['Janet'], family: 'Doe' }] });
            store.failWrites = true;
            const onComplete = vi.fn<CompletionCallback>();

            await model.download(onComplete);

            const error = onComplete.mock.calls[0][0];
            expect(error).toBeInstanceOf(PersistenceError);
            expect(error?.message).toBe('Failed to persist local record cached after download: disk full');
            expect(store.get('cached')).toEqual(syncedRecord());
            expect(model.givenName).toBe('Jane');
        });

        it('fails with SyncConflictError when a save lands during the download', async () => {
            const { deps, store, remote } = createHarness();
            store.upsert(syncedRecord());
            const model = new PatientModel(deps);
            model.open('cached');
            const pending = deferred<Patient>();
            remote.fetchById.mockReturnValueOnce(pending.promise);
            const onComplete = vi.fn<CompletionCallback>();

            const download = model.download(onComplete);
            await vi.waitFor(() => expect(remote.fetchById).toHaveBeenCalledTimes(1));
            model.givenName = 'Local';
            model.save();
            pending.resolve({ ...JANE, id: '42', name: [{ given: ['Remote'], family: 'Doe' }] });
            await download;

            expect(onComplete.mock.calls[0][0]).toBeInstanceOf(SyncConflictError);
            expect(model.givenName).toBe('Local');
            expect(store.get('cached')).toMatchObject({ version: 4, resource: { name: [{ given: ['Local'], family: 'Doe' }] } });
        });
    });
});
