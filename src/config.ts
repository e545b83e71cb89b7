import { z } from 'zod';
import fs from 'fs/promises';
import _ from 'lodash';

// --- Configuration Schema ---

const FhirConfigSchema = z.object({
    baseUrl: z.string().url(),
    maxSearchPages: z.number().int().positive(),
});

const AuthConfigSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('none') }),
    z.object({
        type: z.literal('basic'),
        clientId: z.string().min(1),
        clientSecret: z.string().min(1),
    }),
    z.object({
        type: z.literal('bearer'),
        token: z.string().min(1),
    }),
]);

const PersistenceConfigSchema = z.object({
    dbPath: z.string().min(1), // ':memory:' is accepted
});

const ConfigSchema = z.object({
    fhir: FhirConfigSchema,
    auth: AuthConfigSchema,
    persistence: PersistenceConfigSchema,
});

// --- Configuration Type ---
export type AppConfig = z.infer<typeof ConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = {
    fhir: {
        baseUrl: 'http://localhost:8080/fhir',
        maxSearchPages: 20,
    },
    auth: { type: 'none' },
    persistence: {
        dbPath: './patients.sqlite',
    },
};

type Env = Record<string, string | undefined>;

// --- Configuration Loading ---

/**
 * Loads the configuration. Without a path only defaults and environment
 * overrides apply; with a path the file must exist and parse.
 */
export async function loadConfig(configPath?: string, env: Env = process.env): Promise<AppConfig> {
    let loadedConfig: unknown = {};
    if (configPath) {
        try {
            const configData = await fs.readFile(configPath, 'utf-8');
            loadedConfig = JSON.parse(configData);
            console.error(`[CONFIG] Loaded configuration from ${configPath}`);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[CONFIG] Could not load configuration from ${configPath}: ${message}`);
            throw new Error(`Configuration file not found or invalid: ${configPath}`, { cause: error });
        }
    }

    try {
        return parseConfig(loadedConfig, env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error(`[CONFIG] Configuration validation failed:`, error.errors);
        } else {
            console.error(`[CONFIG] Error loading configuration:`, error);
        }
        throw error;
    }
}

/** Applies defaults and environment overrides, then validates. */
export function parseConfig(raw: unknown, env: Env = {}): AppConfig {
    return ConfigSchema.parse(applyDerivedValues(raw, env));
}

// Defaults first, then environment, so an env var always beats the file.
function applyDerivedValues(raw: unknown, env: Env): unknown {
    const parsed = z.record(z.unknown()).safeParse(raw);
    const result: Record<string, unknown> = parsed.success ? _.cloneDeep(parsed.data) : {};
    _.defaultsDeep(result, _.cloneDeep(DEFAULT_CONFIG));

    if (env.FHIR_BASE_URL) {
        _.set(result, 'fhir.baseUrl', env.FHIR_BASE_URL);
    }
    if (env.FHIR_BEARER_TOKEN) {
        result.auth = { type: 'bearer', token: env.FHIR_BEARER_TOKEN };
    } else if (env.FHIR_CLIENT_ID && env.FHIR_CLIENT_SECRET) {
        result.auth = { type: 'basic', clientId: env.FHIR_CLIENT_ID, clientSecret: env.FHIR_CLIENT_SECRET };
    }
    if (env.PATIENT_DB_PATH) {
        _.set(result, 'persistence.dbPath', env.PATIENT_DB_PATH);
    }

    return result;
}
