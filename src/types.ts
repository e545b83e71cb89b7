import { z } from 'zod';

// --- FHIR Wire Schemas ---

export const ContactPointSchema = z.object({
    system: z.enum(['phone', 'fax', 'email', 'pager', 'url', 'sms', 'other']).optional(),
    value: z.string().optional(),
    use: z.enum(['home', 'work', 'temp', 'old', 'mobile']).optional(),
    rank: z.number().int().positive().optional(),
}).passthrough();

// `family` is a list in DSTU2 and a single string from STU3 on; accept both when reading.
export const HumanNameSchema = z.object({
    use: z.string().optional(),
    text: z.string().optional(),
    family: z.union([z.string(), z.array(z.string())]).optional(),
    given: z.array(z.string()).optional(),
}).passthrough();

export const AttachmentSchema = z.object({
    contentType: z.string().optional(),
    data: z.string().optional(),
    url: z.string().optional(),
    title: z.string().optional(),
}).passthrough();

export const PatientSchema = z.object({
    resourceType: z.literal('Patient'),
    id: z.string().min(1).optional(),
    meta: z.object({
        versionId: z.string().optional(),
        lastUpdated: z.string().optional(),
    }).passthrough().optional(),
    name: z.array(HumanNameSchema).optional(),
    telecom: z.array(ContactPointSchema).optional(),
    // Kept as a plain string: unrecognized codes decode to 'unknown' instead of failing the parse.
    gender: z.string().optional(),
    birthDate: z.string().optional(),
    photo: z.array(AttachmentSchema).optional(),
}).passthrough();

export const BundleSchema = z.object({
    resourceType: z.literal('Bundle'),
    type: z.string().optional(),
    total: z.number().int().nonnegative().optional(),
    link: z.array(z.object({ relation: z.string(), url: z.string() })).optional(),
    entry: z.array(z.object({ resource: z.unknown().optional() }).passthrough()).optional(),
}).passthrough();

export type ContactPoint = z.infer<typeof ContactPointSchema>;
export type HumanName = z.infer<typeof HumanNameSchema>;
export type Attachment = z.infer<typeof AttachmentSchema>;
export type Patient = z.infer<typeof PatientSchema>;
export type Bundle = z.infer<typeof BundleSchema>;

export const PATIENT_RESOURCE_TYPE = 'Patient';

// --- Draft ---

export const GENDERS = ['male', 'female', 'other', 'unknown'] as const;
export type Gender = typeof GENDERS[number];

export interface PatientPhoto {
    contentType: string;
    data: Buffer;
}

/**
 * Editable working copy of a patient. Every field may be unset so a form can
 * represent "not filled in yet"; `telecom` defaults to an empty list.
 */
export interface PatientDraft {
    givenName?: string;
    familyName?: string;
    /** FHIR `date`, `YYYY-MM-DD`. */
    birthDate?: string;
    gender?: Gender;
    telecom: ContactPoint[];
    photo?: PatientPhoto;
}

// --- Local Cache ---

export interface LocalPatientRecord {
    localKey: string;
    serverId: string | null;
    resource: Patient;
    /** Starts at 1, bumped on every write. */
    version: number;
    updatedAt: string;
}

/**
 * Keyed store for local patient records. Reads and writes are synchronous.
 */
export interface PatientStore {
    upsert(record: LocalPatientRecord): void;
    get(localKey: string): LocalPatientRecord | null;
    getByServerId(serverId: string): LocalPatientRecord | null;
    list(): LocalPatientRecord[];
}

// --- Sync State ---

export type SyncState =
    | { kind: 'new' }
    | { kind: 'savedLocal'; localKey: string }
    | { kind: 'synced'; serverId: string; localKey: string | null };

/** What the model needs from the remote side; `PatientGateway` implements it. */
export interface PatientRemote {
    findByFamilyName(familyName: string): Promise<Patient[]>;
    /** Resolves with the created resource, carrying its server-assigned id. */
    create(patient: Patient): Promise<Patient>;
    update(id: string, patient: Patient): Promise<Patient>;
    fetchById(id: string): Promise<Patient>;
}

export type CompletionCallback = (error: Error | null) => void;
