import type { AppConfig } from '../config/app-config';
import type { BlobStore, Logger } from '../domain/pipeline/interfaces';
import { GeminiLabelDetector } from '../infra/ai/gemini/gemini-label-detector';
import { GeminiPromptGenerator } from '../infra/ai/gemini/gemini-prompt-generator';
import { PromptPipelineService } from './prompt-pipeline.service';

/** Wires the Gemini adapters and the blob store into a pipeline from one config slice each. */
export function createPromptPipeline(config: AppConfig, blobStore: BlobStore, logger?: Logger): PromptPipelineService {
    return new PromptPipelineService(
        blobStore,
        new GeminiLabelDetector(blobStore, config.vision, logger),
        new GeminiPromptGenerator(config.generation, logger),
        {
            bucket: config.storage.bucket,
            maxLabels: config.vision.maxLabels,
            timeoutMs: config.pipeline.timeoutMs,
            concurrency: config.pipeline.concurrency,
        },
        logger
    );
}
