export enum PipelineErrorCode {
    STORAGE_UPLOAD_FAILED = 'STORAGE_UPLOAD_FAILED',
    STORAGE_READ_FAILED = 'STORAGE_READ_FAILED',
    STORAGE_DELETE_FAILED = 'STORAGE_DELETE_FAILED',
    STORAGE_TIMEOUT = 'STORAGE_TIMEOUT',
    DETECTION_BLOB_NOT_FOUND = 'DETECTION_BLOB_NOT_FOUND',
    DETECTION_UNSUPPORTED_IMAGE = 'DETECTION_UNSUPPORTED_IMAGE',
    DETECTION_NO_LABELS = 'DETECTION_NO_LABELS',
    DETECTION_INVALID_RESPONSE = 'DETECTION_INVALID_RESPONSE',
    DETECTION_AUTH_ERROR = 'DETECTION_AUTH_ERROR',
    DETECTION_TIMEOUT = 'DETECTION_TIMEOUT',
    DETECTION_FAILED = 'DETECTION_FAILED',
    GENERATION_INVALID_PARAMETERS = 'GENERATION_INVALID_PARAMETERS',
    GENERATION_AUTH_ERROR = 'GENERATION_AUTH_ERROR',
    GENERATION_RATE_LIMIT = 'GENERATION_RATE_LIMIT',
    GENERATION_EMPTY_RESPONSE = 'GENERATION_EMPTY_RESPONSE',
    GENERATION_TIMEOUT = 'GENERATION_TIMEOUT',
    GENERATION_FAILED = 'GENERATION_FAILED',
    VALIDATION_PARAMETERS = 'VALIDATION_PARAMETERS',
    VALIDATION_IMAGE_FORMAT = 'VALIDATION_IMAGE_FORMAT',
    VALIDATION_IMAGE_CONTENT = 'VALIDATION_IMAGE_CONTENT',
    VALIDATION_MISSING_IMAGE = 'VALIDATION_MISSING_IMAGE',
    VALIDATION_TOO_MANY_IMAGES = 'VALIDATION_TOO_MANY_IMAGES',
    VALIDATION_MULTIPART = 'VALIDATION_MULTIPART',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type PipelineErrorKind = 'storage' | 'detection' | 'generation' | 'validation' | 'internal';

export class PipelineError extends Error {
    readonly kind: PipelineErrorKind = 'internal';

    constructor(
        public readonly code: PipelineErrorCode,
        message: string,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

/** Upload, read or delete against the blob store failed. */
export class StorageError extends PipelineError {
    override readonly kind = 'storage';

    constructor(code: PipelineErrorCode, message: string, originalError?: unknown) {
        super(code, message, originalError);
        this.name = 'StorageError';
    }
}

/** The vision call failed, or it found nothing worth labelling. */
export class DetectionError extends PipelineError {
    override readonly kind = 'detection';

    constructor(code: PipelineErrorCode, message: string, originalError?: unknown) {
        super(code, message, originalError);
        this.name = 'DetectionError';
    }
}

export class GenerationError extends PipelineError {
    override readonly kind = 'generation';

    constructor(code: PipelineErrorCode, message: string, originalError?: unknown) {
        super(code, message, originalError);
        this.name = 'GenerationError';
    }
}

/** User input outside the contract: bad parameters, unsupported files. */
export class ValidationError extends PipelineError {
    override readonly kind = 'validation';

    constructor(code: PipelineErrorCode, message: string, public readonly details?: unknown) {
        super(code, message);
        this.name = 'ValidationError';
    }
}

export function toPipelineError(error: unknown): PipelineError {
    if (error instanceof PipelineError) return error;
    const message = error instanceof Error ? error.message : 'Unknown pipeline error';
    return new PipelineError(PipelineErrorCode.INTERNAL_ERROR, message, error);
}
