import { describe, it, expect } from 'vitest';
import {
    createGenerationParameters,
    DEFAULT_GENERATION_PARAMETERS,
    DEFAULT_PROMPT_TEMPLATE,
    MAX_PROMPT_TEMPLATE_CHARS,
} from './parameters';
import { PipelineErrorCode, ValidationError } from '../errors';

describe('createGenerationParameters', () => {
    it('should apply the slider defaults when nothing is supplied', () => {
        const params = createGenerationParameters();

        expect(params).toEqual({
            temperature: 0.7,
            topP: 1,
            frequencyPenalty: 0,
            presencePenalty: 0,
            promptTemplate: DEFAULT_PROMPT_TEMPLATE,
        });
        expect(DEFAULT_GENERATION_PARAMETERS).toEqual(params);
    });

    it('should accept the bounds of the unit interval', () => {
        const params = createGenerationParameters({
            temperature: 0,
            topP: 1,
            frequencyPenalty: 1,
            presencePenalty: 0,
            promptTemplate: 'Describe',
        });

        expect(params.temperature).toBe(0);
        expect(params.frequencyPenalty).toBe(1);
        expect(params.promptTemplate).toBe('Describe');
    });

    it('should return a frozen record', () => {
        const params = createGenerationParameters({ temperature: 0.2 });

        expect(Object.isFrozen(params)).toBe(true);
    });

    it('should reject temperature 1.5 with a ValidationError', () => {
        expect(() => createGenerationParameters({ temperature: 1.5 })).toThrow(ValidationError);

        try {
            createGenerationParameters({ temperature: 1.5 });
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            if (error instanceof ValidationError) {
                expect(error.code).toBe(PipelineErrorCode.VALIDATION_PARAMETERS);
                expect(error.message).toBe('temperature must be between 0 and 1');
            }
        }
    });

    it('should reject negative penalties and NaN', () => {
        expect(() => createGenerationParameters({ presencePenalty: -0.1 })).toThrow('presencePenalty must be between 0 and 1');
        expect(() => createGenerationParameters({ topP: Number.NaN })).toThrow(ValidationError);
    });

    it('should cap the template at 350 characters', () => {
        expect(createGenerationParameters({ promptTemplate: 'a'.repeat(MAX_PROMPT_TEMPLATE_CHARS) }).promptTemplate)
            .toHaveLength(350);
        expect(() => createGenerationParameters({ promptTemplate: 'a'.repeat(351) }))
            .toThrow('promptTemplate must be at most 350 characters');
    });
});
