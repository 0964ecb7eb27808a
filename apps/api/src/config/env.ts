import { z } from 'zod';
import * as dotenv from 'dotenv';

dotenv.config();

const numeric = (fallback: number) =>
    z.preprocess((val) => (val === undefined || val === '' ? undefined : Number(val)), z.number().int().positive().default(fallback));

export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: numeric(4000),
    CORS_ORIGIN: z.string().default('*'),
    MONGO_URI: z.string().url().default('mongodb://localhost:27017/picprompt'),
    BLOB_STORE_DRIVER: z.enum(['gridfs', 'memory']).default('gridfs'),
    BLOB_BUCKET: z.string().min(1).default('picprompt'),
    GEMINI_API_KEY: z.string().min(1, 'GEMINI_API_KEY is required'),
    GEMINI_MODEL_VISION: z.string().default('gemini-2.5-flash'),
    GEMINI_MODEL_TEXT: z.string().default('gemini-2.5-flash'),
    REMOTE_CALL_TIMEOUT_MS: numeric(30000),
    MAX_UPLOAD_BYTES: numeric(10485760), // 10MB
    MAX_IMAGES_PER_BATCH: numeric(10),
    PIPELINE_CONCURRENCY: numeric(1),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        console.error('❌ Invalid environment variables:', parsed.error.format());
        process.exit(1);
    }

    return parsed.data;
}
