import type { FastifyInstance } from 'fastify';
import { PipelineError, PipelineErrorCode } from '../../domain/errors';

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
    [PipelineErrorCode.STORAGE_UPLOAD_FAILED]: 502,
    [PipelineErrorCode.STORAGE_READ_FAILED]: 502,
    [PipelineErrorCode.STORAGE_DELETE_FAILED]: 502,
    [PipelineErrorCode.STORAGE_TIMEOUT]: 504,
    [PipelineErrorCode.DETECTION_BLOB_NOT_FOUND]: 502,
    [PipelineErrorCode.DETECTION_UNSUPPORTED_IMAGE]: 400,
    [PipelineErrorCode.DETECTION_NO_LABELS]: 422,
    [PipelineErrorCode.DETECTION_INVALID_RESPONSE]: 502,
    [PipelineErrorCode.DETECTION_AUTH_ERROR]: 401,
    [PipelineErrorCode.DETECTION_TIMEOUT]: 504,
    [PipelineErrorCode.DETECTION_FAILED]: 502,
    [PipelineErrorCode.GENERATION_INVALID_PARAMETERS]: 400,
    [PipelineErrorCode.GENERATION_AUTH_ERROR]: 401,
    [PipelineErrorCode.GENERATION_RATE_LIMIT]: 429,
    [PipelineErrorCode.GENERATION_EMPTY_RESPONSE]: 502,
    [PipelineErrorCode.GENERATION_TIMEOUT]: 504,
    [PipelineErrorCode.GENERATION_FAILED]: 502,
    [PipelineErrorCode.VALIDATION_PARAMETERS]: 400,
    [PipelineErrorCode.VALIDATION_IMAGE_FORMAT]: 400,
    [PipelineErrorCode.VALIDATION_IMAGE_CONTENT]: 400,
    [PipelineErrorCode.VALIDATION_MISSING_IMAGE]: 400,
    [PipelineErrorCode.VALIDATION_TOO_MANY_IMAGES]: 400,
    [PipelineErrorCode.VALIDATION_MULTIPART]: 400,
    [PipelineErrorCode.INTERNAL_ERROR]: 500,
};

export function statusForPipelineError(error: PipelineError): number {
    return STATUS_BY_CODE[error.code];
}

export function registerErrorHandler(server: FastifyInstance, isProduction: boolean) {
    server.setErrorHandler((error, request, reply) => {
        // Log full error details
        request.log.error(error);

        const meta = { requestId: request.id, timings: null, notices: [] };

        if (error instanceof PipelineError) {
            return reply.code(statusForPipelineError(error)).send({
                data: null,
                error: {
                    code: error.code,
                    message: error.message,
                    details: null,
                },
                meta,
            });
        }

        // Handle validation errors (Fastify standard)
        if (error.validation) {
            return reply.code(400).send({
                data: null,
                error: {
                    code: 'VALIDATION_ERROR',
                    message: 'Validation failed',
                    details: error.validation,
                },
                meta,
            });
        }

        // Client errors raised by plugins (file too large, too many parts, rate limit...)
        const status = error.statusCode ?? 500;
        if (status < 500) {
            return reply.code(status).send({
                data: null,
                error: {
                    code: error.code ?? 'REQUEST_ERROR',
                    message: error.message,
                    details: null,
                },
                meta,
            });
        }

        return reply.code(status).send({
            data: null,
            error: {
                code: 'INTERNAL_SERVER_ERROR',
                message: isProduction ? 'Internal Server Error' : error.message,
                details: isProduction ? null : { stack: error.stack },
            },
            meta,
        });
    });
}
