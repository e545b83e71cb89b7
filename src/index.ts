// Export all public classes, utilities and types for easy import

// FHIR wire types, draft and store types
export * from './types.js';
export * from './errors.js';

// Editing and sync
export { PatientModel, type PatientModelDeps } from './PatientModel.js';
export { PatientGateway, type PatientGatewayOptions } from './patientGateway.js';
export {
    emptyDraft,
    cloneDraft,
    decodeGender,
    draftFromPatient,
    patientFromDraft,
    displayName,
    contactPoint,
} from './patientMapping.js';

// Local stores
export { openPatientDatabase, SqlitePatientStore } from './dbUtils.js';
export { InMemoryPatientStore } from './store/InMemoryPatientStore.js';

// Configuration and transport
export { loadConfig, parseConfig, DEFAULT_CONFIG, type AppConfig, type AuthConfig } from './config.js';
export { noAuth, basicAuth, bearerToken, authFromConfig, type AuthHeaderProvider } from './auth.js';
export { resolveFhirUrl, fhirRequest, type FetchLike, type FhirRequestOptions, type FhirResponse } from './utils.js';
