import Fastify, { FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from './interfaces/http/error-handler';
import { promptRoutes } from './interfaces/http/routes/prompt.routes';
import type { PromptBatchProcessor } from './interfaces/http/controllers/prompt.controller';
import type { Logger } from './domain/pipeline/interfaces';

export interface AppOptions {
    /** Composes the pipeline once the server logger exists. */
    createPipeline: (logger: Logger) => PromptBatchProcessor;
    corsOrigin: string;
    maxUploadBytes: number;
    maxImagesPerBatch: number;
    isProduction: boolean;
    logger?: FastifyServerOptions['logger'];
}

const REDACTED_HEADERS = ['req.headers["x-api-key"]', 'req.headers.authorization'];

export function defaultLoggerOptions(isProduction: boolean): FastifyServerOptions['logger'] {
    return isProduction ? {
        redact: REDACTED_HEADERS,
    } : {
        transport: {
            target: 'pino-pretty',
            options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
            },
        },
        redact: REDACTED_HEADERS,
    };
}

export async function buildApp(options: AppOptions) {
    const server = Fastify({
        logger: options.logger ?? defaultLoggerOptions(options.isProduction),
    });

    await server.register(cors, {
        origin: options.corsOrigin,
    });

    await server.register(multipart, {
        limits: {
            fileSize: options.maxUploadBytes,
            // One over the batch limit so the controller can answer with a proper error
            files: options.maxImagesPerBatch + 1,
        },
    });

    await server.register(rateLimit, {
        max: 100,
        timeWindow: '1 minute',
        errorResponseBuilder: (_request, context) => {
            return {
                statusCode: 429,
                code: 'RATE_LIMIT_EXCEEDED',
                message: `Too many requests. Please try again in ${context.after}.`,
            };
        },
    });

    registerErrorHandler(server, options.isProduction);

    server.get('/health', async (request) => {
        return {
            data: { status: 'OK', timestamp: new Date().toISOString() },
            error: null,
            meta: { requestId: request.id, timings: null, notices: [] },
        };
    });

    await server.register(promptRoutes, {
        prefix: '/api/prompts',
        pipeline: options.createPipeline(server.log),
        maxImagesPerBatch: options.maxImagesPerBatch,
    });

    return server;
}
