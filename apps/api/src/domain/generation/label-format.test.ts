import { describe, it, expect } from 'vitest';
import { buildGenerationPrompt, formatLabelList } from './label-format';

describe('formatLabelList', () => {
    it('should render a bracketed list of quoted labels', () => {
        expect(formatLabelList(['Cat', 'Animal', 'Pet'])).toBe("['Cat', 'Animal', 'Pet']");
    });

    it('should render an empty list as brackets', () => {
        expect(formatLabelList([])).toBe('[]');
    });

    it('should escape quotes and backslashes inside labels', () => {
        expect(formatLabelList(["Pet's Bed", 'a\\b'])).toBe("['Pet\\'s Bed', 'a\\\\b']");
    });
});

describe('buildGenerationPrompt', () => {
    it('should join template and labels with a spaced newline', () => {
        expect(buildGenerationPrompt('Write prompts', ['Cat'])).toBe("Write prompts \n ['Cat']");
    });

    it('should still build a prompt when there are no labels', () => {
        expect(buildGenerationPrompt('T', [])).toBe('T \n []');
    });
});
