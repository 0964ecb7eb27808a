import type { GenerationParameters } from '../generation/parameters';
import type { PipelineError } from '../errors';

export interface BlobStore {
    /** Stores `bytes` under `name`, replacing any object already there. */
    put(bucket: string, name: string, bytes: Buffer): Promise<void>;
    /** Resolves `null` when nothing is stored under `name`. */
    get(bucket: string, name: string): Promise<Buffer | null>;
    /** Deleting a missing object resolves normally. */
    delete(bucket: string, name: string): Promise<void>;
}

export interface LabelDetector {
    detect(bucket: string, name: string, maxLabels: number): Promise<string[]>;
}

export interface PromptGenerator {
    generate(labels: readonly string[], params: GenerationParameters): Promise<string>;
}

export interface DisplayedPrompt {
    imageId: string;
    filename: string;
    labels: string[];
    text: string;
}

/**
 * Where finished legs are surfaced. The HTTP layer collects them into the
 * response; a CLI prints them.
 */
export interface OutputSink {
    display(result: DisplayedPrompt): void | Promise<void>;
    fail(imageId: string, filename: string, error: PipelineError): void | Promise<void>;
}

/** Structured logger, pino-compatible. */
export interface Logger {
    info(obj: object, msg?: string): void;
    warn(obj: object, msg?: string): void;
    error(obj: object, msg?: string): void;
}
