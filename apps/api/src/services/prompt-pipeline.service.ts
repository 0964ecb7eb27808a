import { randomUUID } from 'crypto';
import type { BlobStore, LabelDetector, Logger, OutputSink, PromptGenerator } from '../domain/pipeline/interfaces';
import type { GenerationParameters } from '../domain/generation/parameters';
import type { BatchResult, ImageInput, PipelineItemResult, PipelineNotice, PipelineTimings } from '../domain/pipeline/schemas';
import {
    DetectionError,
    GenerationError,
    PipelineError,
    PipelineErrorCode,
    StorageError,
    ValidationError,
    toPipelineError,
} from '../domain/errors';
import { LegStateMachine } from '../domain/pipeline/states';
import { extensionFor } from '../domain/image';
import { WorkerPool } from '../utils/worker-pool';
import { BlobLease } from './blob-lease';

export interface PromptPipelineOptions {
    bucket: string;
    maxLabels: number;
    /** Bound on every remote call: put, detect, generate, delete. */
    timeoutMs: number;
    /** Detect/generate legs run at once. Defaults to 1 (sequential). */
    concurrency?: number;
    /** Storage key for an upload. Must be unique per call. */
    createKey?: (filename: string) => string;
    /**
     * How long cleanup waits for an upload still in flight before deleting.
     * Defaults to `timeoutMs`, and never less than one second.
     */
    writeGraceMs?: number;
}

interface Leg {
    imageId: string;
    filename: string;
    bytes: Buffer;
    lease: BlobLease;
    machine: LegStateMachine;
    stored: boolean;
    labels: string[];
    text: string | null;
    error: PipelineError | null;
}

const defaultKey = (filename: string) => `${randomUUID()}${extensionFor(filename)}`;

const MIN_WRITE_GRACE_MS = 1000;

export class PromptPipelineService {
    private readonly createKey: (filename: string) => string;

    constructor(
        private readonly blobStore: BlobStore,
        private readonly labelDetector: LabelDetector,
        private readonly promptGenerator: PromptGenerator,
        private readonly options: PromptPipelineOptions,
        private readonly logger?: Logger
    ) {
        this.createKey = options.createKey ?? defaultKey;
    }

    private async withTimeout<T>(promise: Promise<T>, onTimeout: () => PipelineError): Promise<T> {
        let timeoutHandle: NodeJS.Timeout | undefined;
        const timeoutPromise = new Promise<never>((_, reject) => {
            timeoutHandle = setTimeout(() => reject(onTimeout()), this.options.timeoutMs);
        });

        try {
            return await Promise.race([promise, timeoutPromise]);
        } finally {
            clearTimeout(timeoutHandle);
        }
    }

    /**
     * Complete upload → detect → generate → display → cleanup pipeline for one batch.
     * Every image is stored before any detection starts; each image then runs its
     * own leg, and its blob is deleted on every exit path.
     */
    async processBatch(
        images: ImageInput[],
        params: GenerationParameters,
        sink: OutputSink,
        requestId: string
    ): Promise<BatchResult> {
        if (images.length === 0) {
            throw new ValidationError(PipelineErrorCode.VALIDATION_MISSING_IMAGE, 'Select at least one image');
        }

        const startTime = Date.now();
        const timings: PipelineTimings = { totalMs: 0, uploadMs: 0, processMs: 0, cleanupMs: 0 };
        const notices: PipelineNotice[] = [];
        const { bucket } = this.options;
        const writeGraceMs = this.options.writeGraceMs ?? Math.max(this.options.timeoutMs, MIN_WRITE_GRACE_MS);

        const legs: Leg[] = images.map(image => {
            const key = this.createKey(image.filename);
            return {
                imageId: key,
                filename: image.filename,
                bytes: image.bytes,
                lease: new BlobLease(bucket, key, (b, k) => this.withTimeout(
                    this.blobStore.delete(b, k),
                    () => new StorageError(PipelineErrorCode.STORAGE_TIMEOUT, `Deleting "${k}" timed out after ${this.options.timeoutMs} ms`)
                ), writeGraceMs),
                machine: new LegStateMachine(),
                stored: false,
                labels: [],
                text: null,
                error: null,
            };
        });

        try {
            // 1. Upload the whole batch
            const uploadStart = Date.now();
            for (const leg of legs) {
                leg.machine.transition('Uploading');
                try {
                    const put = this.blobStore.put(bucket, leg.lease.key, leg.bytes);
                    // A put that times out keeps running; its cleanup waits for it
                    leg.lease.trackWrite(put);
                    await this.withTimeout(
                        put,
                        () => new StorageError(PipelineErrorCode.STORAGE_TIMEOUT, `Upload of "${leg.filename}" timed out after ${this.options.timeoutMs} ms`)
                    );
                    leg.stored = true;
                } catch (error) {
                    try {
                        await this.failLeg(leg, error, sink, requestId);
                    } finally {
                        const cleanupMs = await this.cleanUp(leg, notices, requestId);
                        timings.cleanupMs += cleanupMs;
                    }
                }
            }
            timings.uploadMs = Date.now() - uploadStart;

            // 2. Detect → generate → display → cleanup, per stored image
            const processStart = Date.now();
            const sinkFailures: unknown[] = [];
            const pool = new WorkerPool(this.options.concurrency ?? 1, error => sinkFailures.push(error));
            for (const leg of legs.filter(l => l.stored)) {
                pool.enqueue(async () => {
                    const cleanupMs = await this.runLeg(leg, params, sink, notices, requestId);
                    timings.cleanupMs += cleanupMs;
                });
            }
            await pool.onIdle();
            timings.processMs = Date.now() - processStart;

            if (sinkFailures.length > 0) {
                throw sinkFailures[0];
            }
        } finally {
            // Anything a thrown sink left behind
            for (const leg of legs.filter(l => !l.lease.released)) {
                await this.releaseLease(leg, notices, requestId);
            }
        }

        const failedCount = legs.filter(l => l.machine.hasFailed).length;
        if (failedCount > 0) {
            notices.push({
                code: 'IMAGES_FAILED',
                message: `${failedCount} of ${legs.length} images could not be processed.`,
            });
        }

        timings.totalMs = Date.now() - startTime;
        const items = legs.map(leg => this.toItem(leg));

        this.logger?.info({
            requestId,
            timings,
            counts: {
                images: legs.length,
                succeeded: items.filter(i => i.status === 'succeeded').length,
                failed: failedCount,
            },
            notices: notices.map(n => n.code),
        }, '[Pipeline Summary] Completed');

        return { requestId, items, timings, notices };
    }

    /** Returns the milliseconds spent on cleanup. */
    private async runLeg(
        leg: Leg,
        params: GenerationParameters,
        sink: OutputSink,
        notices: PipelineNotice[],
        requestId: string
    ): Promise<number> {
        const { bucket, maxLabels, timeoutMs } = this.options;
        let cleanupMs = 0;
        try {
            try {
                leg.machine.transition('Detecting');
                leg.labels = await this.withTimeout(
                    this.labelDetector.detect(bucket, leg.lease.key, maxLabels),
                    () => new DetectionError(PipelineErrorCode.DETECTION_TIMEOUT, `Label detection timed out after ${timeoutMs} ms`)
                );

                leg.machine.transition('Generating');
                const text = await this.withTimeout(
                    this.promptGenerator.generate(leg.labels, params),
                    () => new GenerationError(PipelineErrorCode.GENERATION_TIMEOUT, `Prompt generation timed out after ${timeoutMs} ms`)
                );

                leg.machine.transition('Displaying');
                await sink.display({ imageId: leg.imageId, filename: leg.filename, labels: [...leg.labels], text });
                leg.text = text;
            } catch (error) {
                await this.failLeg(leg, error, sink, requestId);
            }
        } finally {
            // Also reached when the sink itself throws; the pool reports that after cleanup.
            cleanupMs = await this.cleanUp(leg, notices, requestId);
        }
        return cleanupMs;
    }

    private async failLeg(leg: Leg, error: unknown, sink: OutputSink, requestId: string): Promise<void> {
        const pipelineError = toPipelineError(error);
        leg.error = pipelineError;
        leg.text = null;
        leg.machine.transition('Failed');

        this.logger?.warn({
            requestId,
            imageId: leg.imageId,
            filename: leg.filename,
            stage: leg.machine.states.at(-2),
            code: pipelineError.code,
            message: pipelineError.message,
        }, '[Pipeline] Image leg failed');

        await sink.fail(leg.imageId, leg.filename, pipelineError);
    }

    private async cleanUp(leg: Leg, notices: PipelineNotice[], requestId: string): Promise<number> {
        const start = Date.now();
        leg.machine.transition('CleaningUp');
        await this.releaseLease(leg, notices, requestId);
        leg.machine.transition('Idle');
        return Date.now() - start;
    }

    private async releaseLease(leg: Leg, notices: PipelineNotice[], requestId: string): Promise<void> {
        try {
            await leg.lease.release();
        } catch (error) {
            const cleanupError = toPipelineError(error);
            this.logger?.error({
                requestId,
                imageId: leg.imageId,
                code: cleanupError.code,
                message: cleanupError.message,
            }, '[Pipeline] Failed to delete temporary blob');
            notices.push({
                code: 'CLEANUP_FAILED',
                message: `Temporary copy of "${leg.filename}" could not be deleted.`,
            });
        }
    }

    private toItem(leg: Leg): PipelineItemResult {
        return {
            imageId: leg.imageId,
            filename: leg.filename,
            status: leg.machine.hasFailed ? 'failed' : 'succeeded',
            labels: leg.labels,
            text: leg.text,
            error: leg.error
                ? { code: leg.error.code, kind: leg.error.kind, message: leg.error.message }
                : null,
            states: leg.machine.states,
        };
    }
}
