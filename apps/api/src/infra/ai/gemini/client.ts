import { GoogleGenerativeAI } from '@google/generative-ai';

/**
 * Creates a Gemini client for the key resolved at startup.
 */
export function createGeminiClient(apiKey: string) {
    return new GoogleGenerativeAI(apiKey);
}

/** HTTP status carried by an SDK error, when there is one. */
export function readErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    return undefined;
}

export function readErrorMessage(error: unknown, fallback: string): string {
    return error instanceof Error && error.message ? error.message : fallback;
}
