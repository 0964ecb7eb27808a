import { z } from 'zod';

const optionalNumber = z.preprocess(
    (val) => (typeof val === 'string' && val.trim() !== '' ? Number(val) : undefined),
    z.number().optional()
);

/** Multipart text fields, as sent by the sliders and the template box. */
export const PromptFieldsSchema = z.object({
    temperature: optionalNumber,
    topP: optionalNumber,
    frequencyPenalty: optionalNumber,
    presencePenalty: optionalNumber,
    promptTemplate: z.string().optional(),
});

export type PromptFields = z.infer<typeof PromptFieldsSchema>;

export const PROMPT_FIELD_NAMES = ['temperature', 'topP', 'frequencyPenalty', 'presencePenalty', 'promptTemplate'] as const;

export type PromptFieldName = typeof PROMPT_FIELD_NAMES[number];

export function isPromptFieldName(name: string): name is PromptFieldName {
    return PROMPT_FIELD_NAMES.some(field => field === name);
}

export const IMAGE_FIELD_NAMES = ['images', 'image'] as const;
