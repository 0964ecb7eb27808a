import fs from 'fs';
import path from 'path';
import { loadEnv } from '../src/config/env';
import { buildAppConfig } from '../src/config/app-config';
import { InMemoryBlobStore } from '../src/infra/storage/memory-blob-store';
import { createPromptPipeline } from '../src/services/pipeline-factory';
import { createGenerationParameters, type GenerationParametersInput } from '../src/domain/generation/parameters';
import type { OutputSink } from '../src/domain/pipeline/interfaces';

const NUMERIC_FLAGS = ['--temperature', '--top-p', '--frequency-penalty', '--presence-penalty'] as const;

function readFlag(args: string[], flag: string): string | undefined {
    const index = args.indexOf(flag);
    if (index < 0) return undefined;
    const value = args[index + 1];
    if (!value || value.startsWith('--')) {
        throw new Error(`Missing value for ${flag}`);
    }
    return value;
}

function parseArgs(args: string[]): { files: string[]; params: GenerationParametersInput } {
    const numeric = (flag: typeof NUMERIC_FLAGS[number]) => {
        const raw = readFlag(args, flag);
        return raw === undefined ? undefined : Number(raw);
    };

    const flagValues = new Set<number>();
    for (const flag of [...NUMERIC_FLAGS, '--template']) {
        const index = args.indexOf(flag);
        if (index >= 0) {
            flagValues.add(index);
            flagValues.add(index + 1);
        }
    }

    return {
        files: args.filter((_, index) => !flagValues.has(index)),
        params: {
            temperature: numeric('--temperature'),
            topP: numeric('--top-p'),
            frequencyPenalty: numeric('--frequency-penalty'),
            presencePenalty: numeric('--presence-penalty'),
            promptTemplate: readFlag(args, '--template'),
        },
    };
}

async function main() {
    const { files, params } = parseArgs(process.argv.slice(2));

    if (files.length === 0) {
        console.error('Please provide image paths: tsx scripts/generate-prompts.ts <image...> [--temperature 0.7] [--top-p 1] [--template "..."]');
        process.exit(1);
    }

    const config = buildAppConfig(loadEnv());
    const blobStore = new InMemoryBlobStore();
    const pipeline = createPromptPipeline(config, blobStore);

    const sink: OutputSink = {
        display: ({ filename, labels, text }) => {
            console.log(`\n✅ ${filename}`);
            console.log(`🏷️  Labels: ${labels.join(', ')}`);
            console.log(`Your Prompts:${text}`);
        },
        fail: (_imageId, filename, error) => {
            console.error(`\n❌ ${filename}: [${error.code}] ${error.message}`);
        },
    };

    const images = files.map(file => ({
        filename: path.basename(file),
        bytes: fs.readFileSync(file),
    }));

    console.log(`🔍 Processing ${images.length} image(s)...`);
    const result = await pipeline.processBatch(images, createGenerationParameters(params), sink, 'cli');
    console.log(`\n⏱️ Duration: ${result.timings.totalMs}ms`);

    if (result.items.some(item => item.status === 'failed')) {
        process.exitCode = 1;
    }
}

main().catch((error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
