import { ContextMessage } from '../summaries/types';

export const TEXT_GENERATION_CLIENT = Symbol('TEXT_GENERATION_CLIENT');

export interface InlineAttachment {
    bytes: Buffer;
    mimeType: string;
}

export interface TextGenerationRequest {
    promptText: string;
    priorContext: ContextMessage[];
    attachment?: InlineAttachment;
    signal?: AbortSignal;
}

/**
 * Boundary to the generative model. Implementations reject with a RemoteError
 * whose `retryable` flag drives the retry policy.
 */
export interface TextGenerationClient {
    generateText(request: TextGenerationRequest): Promise<string>;
}
