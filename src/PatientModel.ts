import { EventEmitter as Emitter } from 'eventemitter3';
import equal from 'fast-deep-equal';
import _ from 'lodash';
import { v4 as uuidv4 } from 'uuid';

import { PersistenceError, RemoteError, SyncConflictError, ValidationError, toError } from './errors.js';
import { cloneDraft, draftFromPatient, emptyDraft, patientFromDraft } from './patientMapping.js';
import {
    PATIENT_RESOURCE_TYPE,
    type CompletionCallback,
    type ContactPoint,
    type Gender,
    type LocalPatientRecord,
    type Patient,
    type PatientDraft,
    type PatientPhoto,
    type PatientRemote,
    type PatientStore,
    type SyncState,
} from './types.js';

type PatientModelEvents = {
    /** Fired after every draft mutation with the recomputed `canSave`. */
    'canSaveChanged': (canSave: boolean) => void;
    /** Fired whenever the managed patient's local record was written. */
    'patientUpdated': (record: LocalPatientRecord) => void;
};

export interface PatientModelDeps {
    store: PatientStore;
    remote: PatientRemote;
    now?: () => Date;
    newLocalKey?: () => string;
}

type RemoteOperation = 'upload' | 'download';

/**
 * Edits one patient and keeps its local record and the server in step.
 *
 * Draft mutations, `canSave` and `save()` are synchronous. `upload()` and
 * `download()` check their precondition synchronously (throwing
 * `ValidationError` before any request), then run one at a time through a
 * per-instance queue and report through `onComplete` exactly once.
 */
export class PatientModel extends Emitter<PatientModelEvents> {
    private readonly store: PatientStore;
    private readonly remote: PatientRemote;
    private readonly now: () => Date;
    private readonly newLocalKey: () => string;

    private draftState: PatientDraft = emptyDraft();
    private syncState: SyncState = { kind: 'new' };
    // Last known full resource; carries the fields the draft does not model.
    private baseResource: Patient | undefined;
    private queue: Promise<void> = Promise.resolve();

    constructor(deps: PatientModelDeps, existing?: Patient | LocalPatientRecord) {
        super();
        this.store = deps.store;
        this.remote = deps.remote;
        this.now = deps.now ?? (() => new Date());
        this.newLocalKey = deps.newLocalKey ?? uuidv4;
        this.initialize(existing);
    }

    // --- Setup ---

    /**
     * Without an argument starts a blank draft for a new patient. With a
     * `Patient` (e.g. a search hit) or a stored record, loads its fields and
     * remembers its server id and local key. A bare `Patient` whose id is
     * already cached locally picks up that record's local key.
     */
    initialize(existing?: Patient | LocalPatientRecord): void {
        if (!existing) {
            this.baseResource = undefined;
            this.draftState = emptyDraft();
            this.syncState = { kind: 'new' };
        } else if ('resourceType' in existing) {
            const serverId = existing.id ?? null;
            const cached = serverId ? this.store.getByServerId(serverId) : null;
            this.baseResource = _.cloneDeep(existing);
            this.draftState = draftFromPatient(existing);
            this.syncState = stateFor(cached?.localKey ?? null, serverId);
        } else {
            this.baseResource = _.cloneDeep(existing.resource);
            this.draftState = draftFromPatient(existing.resource);
            this.syncState = stateFor(existing.localKey, existing.serverId ?? existing.resource.id ?? null);
        }
        this.emit('canSaveChanged', this.canSave);
    }

    /** Loads the stored record with the given local key. */
    open(localKey: string): void {
        const record = this.store.get(localKey);
        if (!record) {
            throw new ValidationError(`No local patient record with key ${localKey}`);
        }
        this.initialize(record);
    }

    // --- Observers ---

    onCanSaveChanged(listener: (canSave: boolean) => void): () => void {
        this.on('canSaveChanged', listener);
        return () => { this.off('canSaveChanged', listener); };
    }

    onPatientUpdated(listener: (record: LocalPatientRecord) => void): () => void {
        this.on('patientUpdated', listener);
        return () => { this.off('patientUpdated', listener); };
    }

    // --- Draft Fields ---

    get givenName(): string | undefined { return this.draftState.givenName; }
    set givenName(value: string | undefined) { this.update({ givenName: value }); }

    get familyName(): string | undefined { return this.draftState.familyName; }
    set familyName(value: string | undefined) { this.update({ familyName: value }); }

    get birthDate(): string | undefined { return this.draftState.birthDate; }
    set birthDate(value: string | undefined) { this.update({ birthDate: value }); }

    get gender(): Gender | undefined { return this.draftState.gender; }
    set gender(value: Gender | undefined) { this.update({ gender: value }); }

    get telecom(): ContactPoint[] { return _.cloneDeep(this.draftState.telecom); }
    set telecom(value: ContactPoint[]) { this.update({ telecom: value }); }

    get photo(): PatientPhoto | undefined { return cloneDraft(this.draftState).photo; }
    set photo(value: PatientPhoto | undefined) { this.update({ photo: value }); }

    /** A copy of the whole draft. */
    get draft(): PatientDraft {
        return cloneDraft(this.draftState);
    }

    /**
     * Applies several field changes at once and returns the new `canSave`.
     * Keys present with `undefined` clear the field.
     */
    update(changes: Partial<PatientDraft>): boolean {
        const next = cloneDraft({ ...this.draftState, ...changes });
        next.telecom = next.telecom ?? [];
        this.draftState = next;
        const canSave = this.canSave;
        this.emit('canSaveChanged', canSave);
        return canSave;
    }

    // --- Derived State ---

    get state(): SyncState {
        return { ...this.syncState };
    }

    get localKey(): string | null {
        return this.syncState.kind === 'new' ? null : this.syncState.localKey;
    }

    get serverId(): string | null {
        return this.syncState.kind === 'synced' ? this.syncState.serverId : null;
    }

    get canSave(): boolean {
        const { givenName, familyName, birthDate, gender } = this.draftState;
        return (givenName?.trim().length ?? 0) > 0
            && (familyName?.trim().length ?? 0) > 0
            && (birthDate?.trim().length ?? 0) > 0
            && gender !== undefined;
    }

    get canDownload(): boolean {
        return this.serverId !== null;
    }

    get canUpload(): boolean {
        const localKey = this.localKey;
        return localKey !== null && this.store.get(localKey) !== null;
    }

    /** `{ reference: 'Patient/<id>' }` once the server knows this patient. */
    get reference(): { reference: string } | null {
        const serverId = this.serverId;
        return serverId ? { reference: `${PATIENT_RESOURCE_TYPE}/${serverId}` } : null;
    }

    // --- Local Save ---

    /**
     * Persists the draft to the local store. Creates the record on first save
     * (new local key, no server id) and overwrites it in place afterwards.
     * Returns false, without writing, while required fields are missing.
     */
    save(): boolean {
        if (!this.canSave) {
            console.warn('[MODEL] Cannot save yet: given name, family name, birth date and gender are required.');
            return false;
        }

        const localKey = this.localKey ?? this.newLocalKey();
        const serverId = this.serverId;
        const existing = this.store.get(localKey);
        const resource = patientFromDraft(this.draftState, existing?.resource ?? this.baseResource);
        if (serverId) {
            resource.id = serverId;
        } else {
            delete resource.id;
        }

        if (existing && existing.serverId === serverId && equal(existing.resource, resource)) {
            console.log(`[MODEL] No changes to save for ${localKey}`);
            return true;
        }

        const record: LocalPatientRecord = {
            localKey,
            serverId,
            resource,
            version: (existing?.version ?? 0) + 1,
            updatedAt: this.now().toISOString(),
        };
        this.write(record, 'save');
        console.log(`[MODEL] Saved ${localKey} locally (version ${record.version})`);

        this.baseResource = _.cloneDeep(resource);
        this.syncState = stateFor(localKey, serverId);
        this.emit('patientUpdated', record);
        return true;
    }

    // --- Remote Sync ---

    /**
     * Sends the saved record to the server: a create when it has no server id
     * yet, otherwise an update of that id. On success the record and draft
     * take the server's representation.
     *
     * @throws ValidationError when the patient has not been saved locally.
     */
    upload(onComplete?: CompletionCallback): Promise<void> {
        const localKey = this.localKey;
        if (localKey === null || !this.canUpload) {
            console.warn('[MODEL] Cannot upload the patient at this time. Has the patient been saved?');
            throw new ValidationError('Cannot upload the patient at this time. Has the patient been saved?');
        }

        return this.enqueue('upload', async () => {
            const record = this.store.get(localKey);
            if (!record) {
                throw new PersistenceError(`Local record ${localKey} disappeared before upload`);
            }
            const serverId = record.serverId ?? this.serverId;
            const remote = serverId
                ? await this.remote.update(serverId, record.resource)
                : await this.remote.create(record.resource);
            this.applyRemote('upload', remote, serverId, localKey, record.version);
        }, onComplete);
    }

    /**
     * Replaces the local record and draft with the server's copy.
     *
     * @throws ValidationError when no server id is known.
     */
    download(onComplete?: CompletionCallback): Promise<void> {
        const serverId = this.serverId;
        if (serverId === null) {
            console.warn('[MODEL] Cannot download the patient at this time. Does the patient have a server id?');
            throw new ValidationError('Cannot download the patient at this time. Does the patient have a server id?');
        }

        return this.enqueue('download', async () => {
            const localKey = this.resolveLocalKey(serverId);
            const dispatchedVersion = localKey ? this.store.get(localKey)?.version ?? null : null;
            const remote = await this.remote.fetchById(serverId);
            this.applyRemote('download', remote, serverId, this.resolveLocalKey(serverId) ?? this.newLocalKey(), dispatchedVersion);
        }, onComplete);
    }

    private resolveLocalKey(serverId: string): string | null {
        return this.localKey ?? this.store.getByServerId(serverId)?.localKey ?? null;
    }

    /**
     * Writes a server response into the local record, then into memory.
     * `dispatchedVersion` is the record version the request was built from; a
     * different version now means a local save landed while it was in flight.
     */
    private applyRemote(
        operation: RemoteOperation,
        remote: Patient,
        requestedId: string | null,
        localKey: string,
        dispatchedVersion: number | null,
    ): void {
        const serverId = remote.id ?? requestedId;
        if (!serverId) {
            throw new RemoteError(0, JSON.stringify(remote), `Server response to ${operation} carries no Patient id`);
        }

        const current = this.store.get(localKey);
        const conflicted = (current?.version ?? null) !== dispatchedVersion;
        if (conflicted && operation === 'download') {
            throw new SyncConflictError(`Local record ${localKey} changed while Patient/${serverId} was downloading; download again to overwrite it`);
        }

        let resource: Patient;
        if (conflicted && current) {
            console.warn(`[MODEL] ${localKey} was saved during upload; keeping local fields, adopting Patient/${serverId}`);
            resource = _.cloneDeep(current.resource);
            resource.id = serverId;
            if (remote.meta) resource.meta = _.cloneDeep(remote.meta);
        } else {
            resource = _.cloneDeep(remote);
            resource.id = serverId;
        }

        const record: LocalPatientRecord = {
            localKey,
            serverId,
            resource,
            version: (current?.version ?? 0) + 1,
            updatedAt: this.now().toISOString(),
        };
        this.write(record, operation);

        this.baseResource = _.cloneDeep(resource);
        if (!conflicted) {
            this.draftState = draftFromPatient(resource);
        }
        this.syncState = { kind: 'synced', serverId, localKey };
        this.emit('canSaveChanged', this.canSave);
        this.emit('patientUpdated', record);
    }

    private write(record: LocalPatientRecord, operation: 'save' | RemoteOperation): void {
        try {
            this.store.upsert(record);
        } catch (error) {
            console.error(`[MODEL] Failed to persist ${record.localKey} after ${operation}:`, error);
            throw new PersistenceError(`Failed to persist local record ${record.localKey} after ${operation}: ${toError(error).message}`, error);
        }
    }

    private enqueue(operation: RemoteOperation, work: () => Promise<void>, onComplete?: CompletionCallback): Promise<void> {
        const run = this.queue.then(work).then(
            () => {
                console.log(`[MODEL] ${operation} completed`);
                onComplete?.(null);
            },
            (error: unknown) => {
                const failure = toError(error);
                console.error(`[MODEL] ${operation} failed: ${failure.message}`);
                onComplete?.(failure);
            },
        );
        this.queue = run.catch((error: unknown) => {
            console.error(`[MODEL] ${operation} completion handler threw:`, error);
        });
        return run;
    }
}

function stateFor(localKey: string | null, serverId: string | null): SyncState {
    if (serverId) return { kind: 'synced', serverId, localKey };
    if (localKey) return { kind: 'savedLocal', localKey };
    return { kind: 'new' };
}
