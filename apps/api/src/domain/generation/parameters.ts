import { z } from 'zod';
import { PipelineErrorCode, ValidationError } from '../errors';

export const MAX_PROMPT_TEMPLATE_CHARS = 350;

export const DEFAULT_PROMPT_TEMPLATE =
    "Make a list of ten interesting and elaborate prompts for image generation based on these labels in an image, start with 'an' and bonus points for adding art styles and artists. Separate instructions with ,";

const unitInterval = (field: string) =>
    z.number({ invalid_type_error: `${field} must be a number` })
        .finite()
        .min(0, `${field} must be between 0 and 1`)
        .max(1, `${field} must be between 0 and 1`);

export const GenerationParametersSchema = z.object({
    temperature: unitInterval('temperature').default(0.7),
    topP: unitInterval('topP').default(1.0),
    frequencyPenalty: unitInterval('frequencyPenalty').default(0.0),
    presencePenalty: unitInterval('presencePenalty').default(0.0),
    promptTemplate: z.string()
        .max(MAX_PROMPT_TEMPLATE_CHARS, `promptTemplate must be at most ${MAX_PROMPT_TEMPLATE_CHARS} characters`)
        .default(DEFAULT_PROMPT_TEMPLATE),
});

export type GenerationParametersInput = z.input<typeof GenerationParametersSchema>;
export type GenerationParameters = Readonly<z.infer<typeof GenerationParametersSchema>>;

export const DEFAULT_GENERATION_PARAMETERS: GenerationParameters = Object.freeze(
    GenerationParametersSchema.parse({})
);

/**
 * Validates user-supplied knobs and returns a frozen parameter record.
 * Throws before anything reaches a remote service.
 */
export function createGenerationParameters(input: GenerationParametersInput = {}): GenerationParameters {
    const result = GenerationParametersSchema.safeParse(input);
    if (!result.success) {
        const first = result.error.issues[0];
        throw new ValidationError(
            PipelineErrorCode.VALIDATION_PARAMETERS,
            first ? first.message : 'Invalid generation parameters',
            result.error.format()
        );
    }
    return Object.freeze(result.data);
}
