import { SchemaType, type GenerationConfig, type Schema } from '@google/generative-ai';
import { z } from 'zod';
import type { BlobStore, LabelDetector, Logger } from '../../../domain/pipeline/interfaces';
import { DetectionError, PipelineError, PipelineErrorCode } from '../../../domain/errors';
import { sniffImageType } from '../../../domain/image';
import { LABELS_SYSTEM_PROMPT, buildLabelsUserPrompt } from './prompts/labels-v1';
import { createGeminiClient, readErrorMessage, readErrorStatus } from './client';

/**
 * Models sometimes answer in percent (97 for 0.97). Those are scaled down,
 * and anything still outside 0..1 is clamped.
 */
export function normalizeConfidence(confidence: number): number {
    const scaled = confidence > 1 ? confidence / 100 : confidence;
    return Math.min(1, Math.max(0, scaled));
}

export const DetectedLabelsSchema = z.object({
    labels: z.array(z.object({
        name: z.string(),
        confidence: z.number().transform(normalizeConfidence).default(0),
    })).default([]),
});

export type DetectedLabels = z.infer<typeof DetectedLabelsSchema>;

/**
 * Strict Schema for Gemini Structured Outputs
 */
const LABELS_RESPONSE_SCHEMA: Schema = {
    type: SchemaType.OBJECT,
    properties: {
        labels: {
            type: SchemaType.ARRAY,
            items: {
                type: SchemaType.OBJECT,
                properties: {
                    name: { type: SchemaType.STRING },
                    confidence: { type: SchemaType.NUMBER },
                },
                required: ['name', 'confidence'],
            },
            description: 'Detected labels, most confident first',
        },
    },
    required: ['labels'],
};

export interface GeminiLabelDetectorOptions {
    apiKey: string;
    model: string;
}

/**
 * Orders labels highest confidence first, keeps the model's order on ties,
 * drops blanks and duplicates, and caps the list at `maxLabels`.
 */
export function rankLabels(detected: DetectedLabels, maxLabels: number): string[] {
    const seen = new Set<string>();
    return detected.labels
        .map((label, index) => ({ name: label.name.trim(), confidence: label.confidence, index }))
        .filter(label => label.name.length > 0)
        .sort((a, b) => b.confidence - a.confidence || a.index - b.index)
        .filter(label => {
            const key = label.name.toLowerCase();
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        })
        .slice(0, Math.max(0, maxLabels))
        .map(label => label.name);
}

export class GeminiLabelDetector implements LabelDetector {
    constructor(
        private readonly blobStore: BlobStore,
        private readonly options: GeminiLabelDetectorOptions,
        private readonly logger?: Logger
    ) { }

    async detect(bucket: string, name: string, maxLabels: number): Promise<string[]> {
        const imageBytes = await this.blobStore.get(bucket, name);
        if (!imageBytes) {
            throw new DetectionError(
                PipelineErrorCode.DETECTION_BLOB_NOT_FOUND,
                `No stored image "${name}" in bucket "${bucket}"`
            );
        }

        const mimeType = sniffImageType(imageBytes);
        if (!mimeType) {
            throw new DetectionError(
                PipelineErrorCode.DETECTION_UNSUPPORTED_IMAGE,
                `Stored object "${name}" is not a PNG or JPEG image`
            );
        }

        const genAI = createGeminiClient(this.options.apiKey);
        const model = genAI.getGenerativeModel({
            model: this.options.model,
            systemInstruction: LABELS_SYSTEM_PROMPT,
        });

        const generationConfig: GenerationConfig = {
            temperature: 0.1,
            maxOutputTokens: 1000,
            responseMimeType: 'application/json',
            responseSchema: LABELS_RESPONSE_SCHEMA,
        };

        let responseText: string;
        try {
            const result = await model.generateContent({
                contents: [{
                    role: 'user',
                    parts: [
                        { text: buildLabelsUserPrompt(maxLabels) },
                        {
                            inlineData: {
                                mimeType,
                                data: imageBytes.toString('base64'),
                            },
                        },
                    ],
                }],
                generationConfig,
            });
            responseText = result.response.text();
        } catch (error) {
            const status = readErrorStatus(error);
            const message = readErrorMessage(error, 'Unknown vision error');
            this.logger?.error({ bucket, name, status, message }, '[LabelDetector] Vision call failed');

            if (status === 401 || status === 403) {
                throw new DetectionError(PipelineErrorCode.DETECTION_AUTH_ERROR, 'Invalid API Key', error);
            }
            throw new DetectionError(PipelineErrorCode.DETECTION_FAILED, message, error);
        }

        const labels = rankLabels(this.parseResponse(responseText), maxLabels);
        if (labels.length === 0) {
            throw new DetectionError(PipelineErrorCode.DETECTION_NO_LABELS, `No labels found for "${name}"`);
        }

        this.logger?.info({ bucket, name, labels }, '[LabelDetector] Labels detected');
        return labels;
    }

    private parseResponse(responseText: string): DetectedLabels {
        try {
            const validated = DetectedLabelsSchema.safeParse(JSON.parse(responseText));
            if (!validated.success) {
                throw new DetectionError(
                    PipelineErrorCode.DETECTION_INVALID_RESPONSE,
                    'Failed to validate AI output schema',
                    validated.error.format()
                );
            }
            return validated.data;
        } catch (parseError) {
            if (parseError instanceof PipelineError) throw parseError;

            throw new DetectionError(
                PipelineErrorCode.DETECTION_INVALID_RESPONSE,
                'Failed to parse AI response as JSON',
                responseText
            );
        }
    }
}
