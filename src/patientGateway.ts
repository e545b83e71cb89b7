import { RemoteError } from './errors.js';
import { noAuth, type AuthHeaderProvider } from './auth.js';
import { fhirRequest, resolveFhirUrl, type FetchLike, type FhirResponse } from './utils.js';
import {
    BundleSchema,
    PATIENT_RESOURCE_TYPE,
    PatientSchema,
    type Patient,
    type PatientRemote,
} from './types.js';

export interface PatientGatewayOptions {
    baseUrl: string;
    auth?: AuthHeaderProvider;
    fetchImpl?: FetchLike;
    /** Upper bound on `next` links followed by a search. Defaults to 20. */
    maxSearchPages?: number;
}

const DEFAULT_MAX_SEARCH_PAGES = 20;

/**
 * Stateless translation between `Patient` resources and a FHIR REST endpoint.
 * Nothing is retried; failures surface as `RemoteError` or `TransportError`.
 */
export class PatientGateway implements PatientRemote {
    private readonly baseUrl: string;
    private readonly auth: AuthHeaderProvider;
    private readonly fetchImpl: FetchLike;
    private readonly maxSearchPages: number;

    constructor(options: PatientGatewayOptions) {
        this.baseUrl = options.baseUrl;
        this.auth = options.auth ?? noAuth();
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.maxSearchPages = options.maxSearchPages ?? DEFAULT_MAX_SEARCH_PAGES;
    }

    /**
     * Finds patients by family name. Matching (exact, prefix, fuzzy) is up to
     * the server; every page of the result set is followed.
     */
    async findByFamilyName(familyName: string): Promise<Patient[]> {
        const url = resolveFhirUrl(PATIENT_RESOURCE_TYPE, this.baseUrl);
        url.searchParams.set('family', familyName);

        const patients: Patient[] = [];
        let nextUrl: string | undefined = url.toString();
        let pageCount = 0;

        while (nextUrl && pageCount < this.maxSearchPages) {
            pageCount++;
            const response = await this.send(nextUrl);
            const parsed = BundleSchema.safeParse(response.json);
            if (!parsed.success) {
                throw new RemoteError(response.status, response.body, `Search response from ${nextUrl} is not a Bundle`);
            }
            for (const entry of parsed.data.entry ?? []) {
                const patient = PatientSchema.safeParse(entry.resource);
                // Search sets may carry OperationOutcome entries alongside matches.
                if (patient.success) patients.push(patient.data);
            }
            const next = parsed.data.link?.find(link => link.relation === 'next')?.url;
            nextUrl = next === undefined ? undefined : this.sameOriginUrl(next);
        }
        if (nextUrl) {
            console.warn(`[GATEWAY] Stopped after ${this.maxSearchPages} pages searching family "${familyName}". Results may be incomplete.`);
        }
        console.log(`[GATEWAY] Search for family "${familyName}" returned ${patients.length} patient(s)`);
        return patients;
    }

    /** Creates a patient. Any client-side `id` is dropped; the server assigns one. */
    async create(patient: Patient): Promise<Patient> {
        const { id: _ignored, ...body } = patient;
        const url = resolveFhirUrl(PATIENT_RESOURCE_TYPE, this.baseUrl).toString();
        const response = await this.send(url, 'POST', body);
        const created = this.toPatient(response, url);
        if (!created.id) {
            throw new RemoteError(response.status, response.body, `Server did not assign an id to the created Patient`);
        }
        console.log(`[GATEWAY] Created Patient/${created.id}`);
        return created;
    }

    async update(id: string, patient: Patient): Promise<Patient> {
        const url = this.instanceUrl(id);
        const updated = this.toPatient(await this.send(url, 'PUT', { ...patient, id }), url);
        console.log(`[GATEWAY] Updated Patient/${id}`);
        return updated;
    }

    async fetchById(id: string): Promise<Patient> {
        const url = this.instanceUrl(id);
        return this.toPatient(await this.send(url), url);
    }

    /** Resolves a paging link, refusing one that would carry credentials to another origin. */
    private sameOriginUrl(link: string): string | undefined {
        const resolved = resolveFhirUrl(link, this.baseUrl);
        const baseOrigin = new URL(this.baseUrl).origin;
        if (resolved.origin !== baseOrigin) {
            console.warn(`[GATEWAY] Not following next link to ${resolved.origin}; expected ${baseOrigin}. Results may be incomplete.`);
            return undefined;
        }
        return resolved.toString();
    }

    private instanceUrl(id: string): string {
        return resolveFhirUrl(`${PATIENT_RESOURCE_TYPE}/${encodeURIComponent(id)}`, this.baseUrl).toString();
    }

    private send(url: string, method: 'GET' | 'POST' | 'PUT' = 'GET', body?: unknown): Promise<FhirResponse> {
        return fhirRequest(url, { method, body, auth: this.auth, fetchImpl: this.fetchImpl });
    }

    private toPatient(response: FhirResponse, url: string): Patient {
        const parsed = PatientSchema.safeParse(response.json);
        if (!parsed.success) {
            console.error(`[GATEWAY] Response from ${url} is not a valid Patient:`, parsed.error.issues);
            throw new RemoteError(response.status, response.body, `Response from ${url} is not a valid Patient`);
        }
        return parsed.data;
    }
}
