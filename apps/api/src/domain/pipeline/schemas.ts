import type { PipelineErrorCode } from '../errors';
import type { PipelineState } from './states';

export interface ImageInput {
    filename: string;
    bytes: Buffer;
}

export type ItemStatus = 'succeeded' | 'failed';

export interface PipelineItemError {
    code: PipelineErrorCode;
    kind: string;
    message: string;
}

export interface PipelineItemResult {
    imageId: string;
    filename: string;
    status: ItemStatus;
    labels: string[];
    text: string | null;
    error: PipelineItemError | null;
    states: PipelineState[];
}

export interface PipelineTimings {
    totalMs: number;
    uploadMs: number;
    processMs: number;
    cleanupMs: number;
}

export interface PipelineNotice {
    code: string;
    message: string;
}

export interface BatchResult {
    requestId: string;
    items: PipelineItemResult[];
    timings: PipelineTimings;
    notices: PipelineNotice[];
}
