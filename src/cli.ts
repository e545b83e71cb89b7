#!/usr/bin/env node
import { Command, Option } from 'commander';
import fs from 'fs/promises';
import path from 'path';

import { authFromConfig } from './auth.js';
import { loadConfig } from './config.js';
import { openPatientDatabase, SqlitePatientStore } from './dbUtils.js';
import { PatientGateway } from './patientGateway.js';
import { PatientModel } from './PatientModel.js';
import { contactPoint, displayName } from './patientMapping.js';
import { GENDERS, type CompletionCallback, type ContactPoint, type Gender, type LocalPatientRecord, type Patient, type PatientDraft } from './types.js';

const CLI_VERSION = '0.1.0';

type GlobalOptions = {
    config?: string;
    db?: string;
};

interface PatientFieldOptions {
    given?: string;
    family?: string;
    birthDate?: string;
    gender?: Gender;
    phone: string[];
    email: string[];
    photo?: string;
}

interface CliContext {
    store: SqlitePatientStore;
    gateway: PatientGateway;
}

const FHIR_DATE = /^\d{4}(-\d{2}(-\d{2})?)?$/;

const PHOTO_TYPES: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.gif': 'image/gif',
};

// --- Helpers ---

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function print(line: string): void {
    process.stdout.write(`${line}\n`);
}

function describePatient(patient: Patient, localKey?: string): string {
    const columns = [
        localKey ?? '-',
        patient.id ?? '(not uploaded)',
        displayName(patient),
        patient.birthDate ?? '?',
        patient.gender ?? '?',
    ];
    return columns.join('\t');
}

function describeRecord(record: LocalPatientRecord): string {
    return describePatient(record.resource, record.localKey);
}

/** Turns a completion-callback operation into a promise that rejects on failure. */
function completion(start: (done: CompletionCallback) => Promise<void>): Promise<void> {
    return new Promise((resolve, reject) => {
        start(error => (error ? reject(error) : resolve())).catch(reject);
    });
}

async function draftChanges(options: PatientFieldOptions): Promise<Partial<PatientDraft>> {
    const changes: Partial<PatientDraft> = {};
    if (options.given !== undefined) changes.givenName = options.given;
    if (options.family !== undefined) changes.familyName = options.family;
    if (options.birthDate !== undefined) {
        if (!FHIR_DATE.test(options.birthDate)) {
            throw new Error(`Birth date must look like YYYY, YYYY-MM or YYYY-MM-DD, got "${options.birthDate}"`);
        }
        changes.birthDate = options.birthDate;
    }
    if (options.gender !== undefined) changes.gender = options.gender;

    const contacts: ContactPoint[] = [
        ...options.phone.map(value => contactPoint('phone', value)),
        ...options.email.map(value => contactPoint('email', value)),
    ];
    if (contacts.length > 0) changes.telecom = contacts;

    if (options.photo) {
        const photoPath = path.resolve(options.photo);
        changes.photo = {
            contentType: PHOTO_TYPES[path.extname(photoPath).toLowerCase()] ?? 'application/octet-stream',
            data: await fs.readFile(photoPath),
        };
    }
    return changes;
}

function addFieldOptions(command: Command): Command {
    return command
        .option('--given <name>', 'Given name')
        .option('--family <name>', 'Family name')
        .option('--birth-date <date>', 'Birth date (YYYY-MM-DD)')
        .addOption(new Option('--gender <gender>', 'Administrative gender').choices(GENDERS))
        .option('--phone <number>', 'Phone number (repeatable, replaces existing contacts)', collect, [])
        .option('--email <address>', 'Email address (repeatable, replaces existing contacts)', collect, [])
        .option('--photo <file>', 'Image file to attach as the patient photo');
}

// --- Main CLI Function ---

async function main(): Promise<void> {
    const program = new Command();
    let context: CliContext | undefined;
    let db: ReturnType<typeof openPatientDatabase> | undefined;

    program
        .name('patient-sync')
        .description('Edits FHIR Patient records locally and syncs them with a FHIR server.')
        .version(CLI_VERSION)
        .option('-c, --config <path>', 'Path to a JSON config file')
        .option('--db <path>', 'SQLite database file (overrides persistence.dbPath)');

    async function getContext(): Promise<CliContext> {
        if (context) return context;
        const options = program.opts<GlobalOptions>();
        const config = await loadConfig(options.config ? path.resolve(options.config) : undefined);
        const dbPath = options.db ?? config.persistence.dbPath;
        console.error(`[CLI] Using database: ${dbPath}`);
        db = openPatientDatabase(dbPath === ':memory:' ? dbPath : path.resolve(dbPath));
        context = {
            store: new SqlitePatientStore(db),
            gateway: new PatientGateway({
                baseUrl: config.fhir.baseUrl,
                auth: authFromConfig(config.auth),
                maxSearchPages: config.fhir.maxSearchPages,
            }),
        };
        return context;
    }

    function modelFor(ctx: CliContext, existing?: Patient | LocalPatientRecord): PatientModel {
        return new PatientModel({ store: ctx.store, remote: ctx.gateway }, existing);
    }

    function requireRecord(ctx: CliContext, localKey: string): LocalPatientRecord {
        const record = ctx.store.get(localKey);
        if (!record) throw new Error(`No local patient record with key ${localKey}`);
        return record;
    }

    function openModel(ctx: CliContext, localKey: string): PatientModel {
        const model = modelFor(ctx);
        model.open(localKey);
        return model;
    }

    program
        .command('search')
        .description('Search the server for patients by family name')
        .argument('<family>', 'Family name to search for')
        .action(async (family: string) => {
            const ctx = await getContext();
            const patients = await ctx.gateway.findByFamilyName(family);
            for (const patient of patients) {
                const cached = patient.id ? ctx.store.getByServerId(patient.id) : null;
                print(describePatient(patient, cached?.localKey));
            }
            console.error(`[CLI] ${patients.length} match(es)`);
        });

    program
        .command('list')
        .description('List locally stored patients')
        .action(async () => {
            const ctx = await getContext();
            ctx.store.list().forEach(record => print(describeRecord(record)));
        });

    program
        .command('show')
        .description('Print a stored patient as FHIR JSON')
        .argument('<localKey>', 'Local key of the patient')
        .action(async (localKey: string) => {
            const ctx = await getContext();
            print(JSON.stringify(requireRecord(ctx, localKey).resource, null, 2));
        });

    addFieldOptions(program.command('new'))
        .description('Create a patient locally (not uploaded)')
        .action(async (options: PatientFieldOptions) => {
            const ctx = await getContext();
            const model = modelFor(ctx);
            model.update(await draftChanges(options));
            if (!model.save()) {
                throw new Error('Patient not saved: --given, --family, --birth-date and --gender are required.');
            }
            print(model.localKey ?? '');
        });

    addFieldOptions(program.command('edit'))
        .description('Change fields of a stored patient')
        .argument('<localKey>', 'Local key of the patient')
        .action(async (localKey: string, options: PatientFieldOptions) => {
            const ctx = await getContext();
            const model = openModel(ctx, localKey);
            model.update(await draftChanges(options));
            if (!model.save()) {
                throw new Error('Patient not saved: required fields would be empty.');
            }
            print(describeRecord(requireRecord(ctx, localKey)));
        });

    program
        .command('upload')
        .description('Create or update the patient on the server')
        .argument('<localKey>', 'Local key of the patient')
        .action(async (localKey: string) => {
            const ctx = await getContext();
            const model = openModel(ctx, localKey);
            await completion(done => model.upload(done));
            print(`${localKey}\t${model.reference?.reference ?? ''}`);
        });

    program
        .command('download')
        .description('Replace the stored patient with the server copy')
        .argument('<localKey>', 'Local key of the patient')
        .action(async (localKey: string) => {
            const ctx = await getContext();
            const model = openModel(ctx, localKey);
            await completion(done => model.download(done));
            print(describeRecord(requireRecord(ctx, localKey)));
        });

    program
        .command('import')
        .description('Download a server patient into the local store')
        .argument('<serverId>', 'Server id of the patient')
        .action(async (serverId: string) => {
            const ctx = await getContext();
            const model = modelFor(ctx, { resourceType: 'Patient', id: serverId });
            await completion(done => model.download(done));
            print(model.localKey ?? '');
        });

    try {
        await program.parseAsync(process.argv);
    } finally {
        if (db) {
            db.close();
            console.error('[CLI] Database connection closed.');
        }
    }
}

// Run the main function
main().catch(err => {
    console.error('[CLI] Error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
