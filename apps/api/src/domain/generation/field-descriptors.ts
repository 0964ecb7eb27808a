import { DEFAULT_GENERATION_PARAMETERS, MAX_PROMPT_TEMPLATE_CHARS } from './parameters';

export interface SliderDescriptor {
    name: 'temperature' | 'topP' | 'frequencyPenalty' | 'presencePenalty';
    label: string;
    min: number;
    max: number;
    step: number;
    defaultValue: number;
    help: string;
}

export const HOW_IT_WORKS =
    'This application uses computer vision to identify what appears on the uploaded image, and then creates a set of prompts using Natural Language Processing. Feel free to experiment with the prompt to get different results.';

export const ACCEPTED_IMAGE_TYPES = ['image/png', 'image/jpeg'] as const;

export const SLIDER_DESCRIPTORS: readonly SliderDescriptor[] = [
    {
        name: 'temperature',
        label: 'Temperature',
        min: 0,
        max: 1,
        step: 0.01,
        defaultValue: DEFAULT_GENERATION_PARAMETERS.temperature,
        help: 'Controls randomness. Lowering this results in less random completions. As the temperature approaches zero, the model will become deterministic and repetitive.',
    },
    {
        name: 'topP',
        label: 'Top P',
        min: 0,
        max: 1,
        step: 0.01,
        defaultValue: DEFAULT_GENERATION_PARAMETERS.topP,
        help: 'Controls diversity via nucleus sampling: 0.5 means half of all likelihood-weighted options are considered.',
    },
    {
        name: 'frequencyPenalty',
        label: 'Frequency Penalty',
        min: 0,
        max: 1,
        step: 0.01,
        defaultValue: DEFAULT_GENERATION_PARAMETERS.frequencyPenalty,
        help: "How much to penalize new tokens based on their existing frequency in the text so far. Decreases the model's likelihood to repeat the same line verbatim.",
    },
    {
        name: 'presencePenalty',
        label: 'Presence Penalty',
        min: 0,
        max: 1,
        step: 0.01,
        defaultValue: DEFAULT_GENERATION_PARAMETERS.presencePenalty,
        help: "How much to penalize new tokens based on whether they appear in the text so far. Increases the model's likelihood to talk about new topics.",
    },
];

export function describeGenerationFields() {
    return {
        description: HOW_IT_WORKS,
        defaults: DEFAULT_GENERATION_PARAMETERS,
        sliders: SLIDER_DESCRIPTORS,
        promptTemplate: {
            label: 'Prompt Text',
            maxLength: MAX_PROMPT_TEMPLATE_CHARS,
            defaultValue: DEFAULT_GENERATION_PARAMETERS.promptTemplate,
        },
        acceptedImageTypes: ACCEPTED_IMAGE_TYPES,
    };
}
