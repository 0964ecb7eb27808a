import type { GenerationConfig, GenerateContentResponse } from '@google/generative-ai';
import type { Logger, PromptGenerator } from '../../../domain/pipeline/interfaces';
import { GenerationError, PipelineErrorCode } from '../../../domain/errors';
import { GenerationParametersSchema, type GenerationParameters } from '../../../domain/generation/parameters';
import { buildGenerationPrompt } from '../../../domain/generation/label-format';
import { createGeminiClient, readErrorMessage, readErrorStatus } from './client';

export interface GeminiPromptGeneratorOptions {
    apiKey: string;
    model: string;
    maxOutputTokens: number;
}

/** Text of the first candidate, parts joined as returned. */
export function firstCandidateText(response: GenerateContentResponse): string {
    const parts = response.candidates?.[0]?.content?.parts ?? [];
    return parts.map(part => part.text ?? '').join('');
}

export class GeminiPromptGenerator implements PromptGenerator {
    constructor(
        private readonly options: GeminiPromptGeneratorOptions,
        private readonly logger?: Logger
    ) { }

    async generate(labels: readonly string[], params: GenerationParameters): Promise<string> {
        const checked = GenerationParametersSchema.safeParse(params);
        if (!checked.success) {
            throw new GenerationError(
                PipelineErrorCode.GENERATION_INVALID_PARAMETERS,
                checked.error.issues[0]?.message ?? 'Invalid generation parameters',
                checked.error.format()
            );
        }

        const genAI = createGeminiClient(this.options.apiKey);
        const model = genAI.getGenerativeModel({ model: this.options.model });

        const generationConfig: GenerationConfig = {
            temperature: params.temperature,
            topP: params.topP,
            frequencyPenalty: params.frequencyPenalty,
            presencePenalty: params.presencePenalty,
            maxOutputTokens: this.options.maxOutputTokens,
        };

        const prompt = buildGenerationPrompt(params.promptTemplate, labels);

        let text: string;
        try {
            const result = await model.generateContent({
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                generationConfig,
            });
            text = firstCandidateText(result.response);
        } catch (error) {
            const status = readErrorStatus(error);
            const message = readErrorMessage(error, 'Unknown generation error');
            this.logger?.error({ status, message, labelCount: labels.length }, '[PromptGenerator] Generation call failed');

            if (status === 401 || status === 403) {
                throw new GenerationError(PipelineErrorCode.GENERATION_AUTH_ERROR, 'Invalid API Key', error);
            }
            if (status === 429) {
                throw new GenerationError(PipelineErrorCode.GENERATION_RATE_LIMIT, 'Text generation rate limit exceeded', error);
            }
            if (status === 400) {
                throw new GenerationError(PipelineErrorCode.GENERATION_INVALID_PARAMETERS, message, error);
            }
            throw new GenerationError(PipelineErrorCode.GENERATION_FAILED, message, error);
        }

        if (text.length === 0) {
            throw new GenerationError(PipelineErrorCode.GENERATION_EMPTY_RESPONSE, 'Text generation returned no completion');
        }

        this.logger?.info({ model: this.options.model, labelCount: labels.length, chars: text.length }, '[PromptGenerator] Completion received');
        return text;
    }
}
