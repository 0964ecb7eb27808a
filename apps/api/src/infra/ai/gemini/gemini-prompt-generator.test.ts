import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GeminiPromptGenerator, firstCandidateText } from './gemini-prompt-generator';
import { DEFAULT_GENERATION_PARAMETERS, createGenerationParameters } from '../../../domain/generation/parameters';
import { PipelineErrorCode } from '../../../domain/errors';

const mockGenerateContent = vi.fn();
const mockGetGenerativeModel = vi.fn().mockReturnValue({
    generateContent: mockGenerateContent,
});

vi.mock('@google/generative-ai', () => ({
    GoogleGenerativeAI: vi.fn().mockImplementation(() => ({
        getGenerativeModel: mockGetGenerativeModel,
    })),
}));

function respondWithText(...parts: string[]) {
    mockGenerateContent.mockResolvedValue({
        response: {
            candidates: [{ content: { role: 'model', parts: parts.map(text => ({ text })) } }],
        },
    });
}

describe('firstCandidateText', () => {
    it('should join the parts of the first candidate only', () => {
        expect(firstCandidateText({
            candidates: [
                { index: 0, content: { role: 'model', parts: [{ text: 'an owl, ' }, { text: 'a fox' }] } },
                { index: 1, content: { role: 'model', parts: [{ text: 'ignored' }] } },
            ],
        })).toBe('an owl, a fox');
    });

    it('should return an empty string without candidates', () => {
        expect(firstCandidateText({})).toBe('');
    });
});

describe('GeminiPromptGenerator', () => {
    let generator: GeminiPromptGenerator;

    beforeEach(() => {
        vi.clearAllMocks();
        generator = new GeminiPromptGenerator({ apiKey: 'test-key', model: 'gemini-text-test', maxOutputTokens: 256 });
    });

    it('should send the template followed by the quoted label list', async () => {
        respondWithText('1. an ornate cat in the style of Klimt');
        const params = createGenerationParameters({ promptTemplate: 'List prompts for' });

        const text = await generator.generate(['Cat', 'Animal'], params);

        expect(text).toBe('1. an ornate cat in the style of Klimt');
        const request = mockGenerateContent.mock.calls[0]?.[0];
        expect(request.contents).toEqual([
            { role: 'user', parts: [{ text: "List prompts for \n ['Cat', 'Animal']" }] },
        ]);
        expect(mockGetGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-text-test' });
    });

    it('should pass the sampling parameters and token cap through', async () => {
        respondWithText('ok');
        const params = createGenerationParameters({ temperature: 0.2, topP: 0.9, frequencyPenalty: 0.5, presencePenalty: 0.1 });

        await generator.generate(['Cat'], params);

        expect(mockGenerateContent.mock.calls[0]?.[0].generationConfig).toEqual({
            temperature: 0.2,
            topP: 0.9,
            frequencyPenalty: 0.5,
            presencePenalty: 0.1,
            maxOutputTokens: 256,
        });
    });

    it('should still call the model for an empty label list', async () => {
        respondWithText('an empty room');

        await expect(generator.generate([], DEFAULT_GENERATION_PARAMETERS)).resolves.toBe('an empty room');

        const request = mockGenerateContent.mock.calls[0]?.[0];
        expect(request.contents[0].parts[0].text.endsWith(' \n []')).toBe(true);
    });

    it('should reject out-of-range parameters before any remote call', async () => {
        const params = { ...DEFAULT_GENERATION_PARAMETERS, temperature: 1.5 };

        await expect(generator.generate(['Cat'], params)).rejects.toMatchObject({
            code: PipelineErrorCode.GENERATION_INVALID_PARAMETERS,
            message: 'temperature must be between 0 and 1',
        });
        expect(mockGenerateContent).not.toHaveBeenCalled();
    });

    it('should fail with GENERATION_EMPTY_RESPONSE when no text comes back', async () => {
        mockGenerateContent.mockResolvedValue({ response: { candidates: [] } });

        await expect(generator.generate(['Cat'], DEFAULT_GENERATION_PARAMETERS)).rejects.toMatchObject({
            code: PipelineErrorCode.GENERATION_EMPTY_RESPONSE,
        });
    });

    it('should map 401 to GENERATION_AUTH_ERROR', async () => {
        mockGenerateContent.mockRejectedValue(Object.assign(new Error('Auth failed'), { status: 401 }));

        await expect(generator.generate(['Cat'], DEFAULT_GENERATION_PARAMETERS)).rejects.toMatchObject({
            code: PipelineErrorCode.GENERATION_AUTH_ERROR,
            message: 'Invalid API Key',
        });
    });

    it('should map 429 to GENERATION_RATE_LIMIT', async () => {
        mockGenerateContent.mockRejectedValue(Object.assign(new Error('quota'), { status: 429 }));

        await expect(generator.generate(['Cat'], DEFAULT_GENERATION_PARAMETERS)).rejects.toMatchObject({
            code: PipelineErrorCode.GENERATION_RATE_LIMIT,
        });
    });

    it('should wrap unknown failures in GENERATION_FAILED', async () => {
        mockGenerateContent.mockRejectedValue(new Error('upstream exploded'));

        await expect(generator.generate(['Cat'], DEFAULT_GENERATION_PARAMETERS)).rejects.toMatchObject({
            code: PipelineErrorCode.GENERATION_FAILED,
            message: 'upstream exploded',
        });
    });
});
