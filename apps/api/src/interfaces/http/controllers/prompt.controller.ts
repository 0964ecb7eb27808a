import type { FastifyRequest, FastifyReply } from 'fastify';
import sharp from 'sharp';
import type { PromptPipelineService } from '../../../services/prompt-pipeline.service';
import type { ImageInput } from '../../../domain/pipeline/schemas';
import type { OutputSink } from '../../../domain/pipeline/interfaces';
import { PipelineErrorCode, ValidationError } from '../../../domain/errors';
import { sniffImageType } from '../../../domain/image';
import { createGenerationParameters, type GenerationParameters } from '../../../domain/generation/parameters';
import { ACCEPTED_IMAGE_TYPES, describeGenerationFields } from '../../../domain/generation/field-descriptors';
import { IMAGE_FIELD_NAMES, PromptFieldsSchema, isPromptFieldName } from '../schemas/prompt.schemas';

export type PromptBatchProcessor = Pick<PromptPipelineService, 'processBatch'>;

const ALLOWED_MIME_TYPES: readonly string[] = [...ACCEPTED_IMAGE_TYPES, 'image/jpg'];

export class PromptController {
    constructor(
        private readonly pipeline: PromptBatchProcessor,
        private readonly maxImagesPerBatch: number
    ) { }

    private sendError(reply: FastifyReply, requestId: string, code: PipelineErrorCode, message: string, details?: unknown) {
        return reply.code(400).send({
            data: null,
            error: { code, message, details: details ?? null },
            meta: { requestId, timings: null, notices: [] },
        });
    }

    /**
     * Orientation is applied and metadata dropped before anything leaves the process.
     * Bytes sharp cannot decode are passed on unchanged.
     */
    private async normalizeImage(request: FastifyRequest, bytes: Buffer, filename: string): Promise<Buffer> {
        try {
            return await sharp(bytes).rotate().toBuffer();
        } catch (error) {
            request.log.warn({ requestId: request.id, filename, error }, 'Failed to normalize image orientation or strip EXIF');
            return bytes;
        }
    }

    async getDefaults(request: FastifyRequest, reply: FastifyReply) {
        return reply.code(200).send({
            data: describeGenerationFields(),
            error: null,
            meta: { requestId: request.id },
        });
    }

    async generatePrompts(request: FastifyRequest, reply: FastifyReply) {
        const requestId = request.id || `req_${Date.now()}`;

        if (!request.isMultipart()) {
            return this.sendError(reply, requestId, PipelineErrorCode.VALIDATION_MULTIPART, 'Expected multipart/form-data');
        }

        const images: ImageInput[] = [];
        const rawFields: Record<string, string> = {};

        for await (const part of request.parts()) {
            if (part.type === 'file') {
                if (!IMAGE_FIELD_NAMES.some(name => name === part.fieldname)) {
                    // Unknown file fields still have to be drained for the parser to move on
                    await part.toBuffer();
                    continue;
                }

                if (!ALLOWED_MIME_TYPES.includes(part.mimetype)) {
                    return this.sendError(
                        reply,
                        requestId,
                        PipelineErrorCode.VALIDATION_IMAGE_FORMAT,
                        `Invalid file type: ${part.mimetype}. Allowed types: ${ACCEPTED_IMAGE_TYPES.join(', ')}`
                    );
                }

                if (images.length >= this.maxImagesPerBatch) {
                    return this.sendError(
                        reply,
                        requestId,
                        PipelineErrorCode.VALIDATION_TOO_MANY_IMAGES,
                        `At most ${this.maxImagesPerBatch} images can be submitted at once`
                    );
                }

                const bytes = await part.toBuffer();

                // Magic byte validation to prevent spoofing
                if (!sniffImageType(bytes)) {
                    return this.sendError(
                        reply,
                        requestId,
                        PipelineErrorCode.VALIDATION_IMAGE_CONTENT,
                        `Invalid image content in "${part.filename}": Magic bytes do not match PNG or JPEG.`
                    );
                }

                images.push({ filename: part.filename, bytes });
            } else if (isPromptFieldName(part.fieldname) && typeof part.value === 'string') {
                rawFields[part.fieldname] = part.value;
            }
        }

        if (images.length === 0) {
            return this.sendError(
                reply,
                requestId,
                PipelineErrorCode.VALIDATION_MISSING_IMAGE,
                'Missing image file in multipart body'
            );
        }

        const fields = PromptFieldsSchema.safeParse(rawFields);
        if (!fields.success) {
            return this.sendError(
                reply,
                requestId,
                PipelineErrorCode.VALIDATION_PARAMETERS,
                'Invalid generation parameters',
                fields.error.format()
            );
        }

        let params: GenerationParameters;
        try {
            params = createGenerationParameters(fields.data);
        } catch (error) {
            if (error instanceof ValidationError) {
                return this.sendError(reply, requestId, error.code, error.message, error.details);
            }
            throw error;
        }

        const normalized: ImageInput[] = [];
        for (const image of images) {
            normalized.push({
                filename: image.filename,
                bytes: await this.normalizeImage(request, image.bytes, image.filename),
            });
        }

        const sink: OutputSink = {
            display: (result) => {
                request.log.info({ requestId, imageId: result.imageId, labels: result.labels }, 'Prompts ready');
            },
            fail: (imageId, filename, error) => {
                request.log.warn({ requestId, imageId, filename, code: error.code }, 'Image could not be processed');
            },
        };

        const result = await this.pipeline.processBatch(normalized, params, sink, requestId);

        return reply.code(200).send({
            data: { items: result.items },
            error: null,
            meta: {
                requestId: result.requestId,
                timings: result.timings,
                notices: result.notices,
            },
        });
    }
}
