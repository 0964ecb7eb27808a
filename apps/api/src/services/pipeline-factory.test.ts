import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createPromptPipeline } from './pipeline-factory';
import { envSchema } from '../config/env';
import { buildAppConfig } from '../config/app-config';
import { InMemoryBlobStore } from '../infra/storage/memory-blob-store';
import { DEFAULT_GENERATION_PARAMETERS } from '../domain/generation/parameters';

// One fake answer serves both the vision and the text call
let active = 0;
let peak = 0;
const mockGenerateContent = vi.fn(async () => {
    active += 1;
    peak = Math.max(peak, active);
    await new Promise(resolve => setTimeout(resolve, 10));
    active -= 1;
    return {
        response: {
            text: () => JSON.stringify({ labels: [{ name: 'Cat', confidence: 0.9 }] }),
            candidates: [{ index: 0, content: { role: 'model', parts: [{ text: 'an owl in a cape' }] } }],
        },
    };
});

vi.mock('@google/generative-ai', () => ({
    GoogleGenerativeAI: vi.fn().mockImplementation(() => ({
        getGenerativeModel: () => ({ generateContent: mockGenerateContent }),
    })),
    SchemaType: { OBJECT: 'object', ARRAY: 'array', STRING: 'string', NUMBER: 'number' },
}));

const JPEG_BYTES = Buffer.from([0xFF, 0xD8, 0xFF, 0xE0, 0x00, 0x10]);

describe('createPromptPipeline', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        active = 0;
        peak = 0;
    });

    it('should honour PIPELINE_CONCURRENCY from the config', async () => {
        const config = buildAppConfig(envSchema.parse({
            GEMINI_API_KEY: 'test-key',
            BLOB_STORE_DRIVER: 'memory',
            PIPELINE_CONCURRENCY: '3',
        }));
        const store = new InMemoryBlobStore();
        const sink = { display: vi.fn(), fail: vi.fn() };

        const result = await createPromptPipeline(config, store).processBatch(
            ['a.jpg', 'b.jpg', 'c.jpg'].map(filename => ({ filename, bytes: JPEG_BYTES })),
            DEFAULT_GENERATION_PARAMETERS,
            sink,
            'req-1'
        );

        expect(peak).toBe(3);
        expect(result.items.map(i => i.text)).toEqual(['an owl in a cape', 'an owl in a cape', 'an owl in a cape']);
        expect(store.list(config.storage.bucket)).toEqual([]);
    });

    it('should run one image at a time by default', async () => {
        const config = buildAppConfig(envSchema.parse({ GEMINI_API_KEY: 'test-key', BLOB_STORE_DRIVER: 'memory' }));
        const sink = { display: vi.fn(), fail: vi.fn() };

        await createPromptPipeline(config, new InMemoryBlobStore()).processBatch(
            ['a.jpg', 'b.jpg'].map(filename => ({ filename, bytes: JPEG_BYTES })),
            DEFAULT_GENERATION_PARAMETERS,
            sink,
            'req-2'
        );

        expect(peak).toBe(1);
        expect(mockGenerateContent).toHaveBeenCalledTimes(4);
    });
});
