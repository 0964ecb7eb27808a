import type { Env } from './env';

/** Labels requested per image; the vision model may return fewer. */
export const MAX_LABELS = 7;

/** Output token budget for a generation call. Not user-tunable. */
export const MAX_OUTPUT_TOKENS = 256;

export interface AppConfig {
    storage: {
        driver: Env['BLOB_STORE_DRIVER'];
        bucket: string;
        mongoUri: string;
    };
    vision: {
        apiKey: string;
        model: string;
        maxLabels: number;
    };
    generation: {
        apiKey: string;
        model: string;
        maxOutputTokens: number;
    };
    pipeline: {
        timeoutMs: number;
        concurrency: number;
    };
    http: {
        port: number;
        corsOrigin: string;
        maxUploadBytes: number;
        maxImagesPerBatch: number;
    };
    isProduction: boolean;
}

/**
 * Builds the explicit configuration handed to every collaborator at startup.
 * Nothing downstream reads process.env.
 */
export function buildAppConfig(env: Env): AppConfig {
    return {
        storage: {
            driver: env.BLOB_STORE_DRIVER,
            bucket: env.BLOB_BUCKET,
            mongoUri: env.MONGO_URI,
        },
        vision: {
            apiKey: env.GEMINI_API_KEY,
            model: env.GEMINI_MODEL_VISION,
            maxLabels: MAX_LABELS,
        },
        generation: {
            apiKey: env.GEMINI_API_KEY,
            model: env.GEMINI_MODEL_TEXT,
            maxOutputTokens: MAX_OUTPUT_TOKENS,
        },
        pipeline: {
            timeoutMs: env.REMOTE_CALL_TIMEOUT_MS,
            concurrency: env.PIPELINE_CONCURRENCY,
        },
        http: {
            port: env.PORT,
            corsOrigin: env.CORS_ORIGIN,
            maxUploadBytes: env.MAX_UPLOAD_BYTES,
            maxImagesPerBatch: env.MAX_IMAGES_PER_BATCH,
        },
        isProduction: env.NODE_ENV === 'production',
    };
}
