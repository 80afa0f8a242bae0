import { ValidationError } from './errors';
import { DocumentKind, PresetRefinementIntent, RefinementIntent, SummarySize } from './types';

export interface SummarySizeInfo {
    label: string;
    description: string;
    wordCount: number;
    instructions: string;
}

export const SIZE_TEMPLATES: Record<SummarySize, SummarySizeInfo> = {
    short: {
        label: 'Short',
        description: '2-3 sentences (~100 words)',
        wordCount: 100,
        instructions: `Create a brief summary that:
- Captures the main point or thesis in 2-3 sentences
- Highlights only the most critical information
- Is concise and to-the-point
- Provides a quick overview for readers`,
    },
    medium: {
        label: 'Medium',
        description: '1-2 paragraphs (~250 words)',
        wordCount: 250,
        instructions: `Create a balanced summary that:
- Covers the main ideas in 1-2 paragraphs
- Includes key supporting details
- Provides sufficient context
- Balances brevity with completeness`,
    },
    long: {
        label: 'Long',
        description: '3-4 paragraphs (~500 words)',
        wordCount: 500,
        instructions: `Create a comprehensive summary that:
- Explores main ideas in depth across 3-4 paragraphs
- Includes important details and examples
- Provides thorough context and background
- Covers multiple aspects of the content
- Maintains clear structure and flow`,
    },
};

export const DOCUMENT_LEAD_INS: Record<DocumentKind, string> = {
    pdf: 'Analyze the following PDF document:',
    image: 'Analyze the text content in the following image:',
    text: 'Analyze the following text document:',
    word: 'Analyze the following Word document:',
    other: 'Analyze the following document:',
};

export interface RefinementAction {
    id: PresetRefinementIntent;
    label: string;
    description: string;
    prompt: string;
}

export const REFINEMENT_ACTIONS: Record<PresetRefinementIntent, RefinementAction> = {
    shorter: {
        id: 'shorter',
        label: 'Shorter',
        description: 'Make it more concise',
        prompt: `Please make this summary shorter and more concise.
- Remove less important details
- Keep only the most essential information
- Maintain clarity and coherence
- Aim for about 30-40% reduction in length`,
    },
    longer: {
        id: 'longer',
        label: 'Longer',
        description: 'Add more details',
        prompt: `Please expand this summary with more details.
- Add more context and explanation
- Include additional relevant information
- Elaborate on key points
- Maintain the same clear structure
- Aim for about 30-40% increase in length`,
    },
    simpler: {
        id: 'simpler',
        label: 'Simpler',
        description: 'Use simpler language',
        prompt: `Please simplify this summary for easier understanding.
- Use simpler language and shorter sentences
- Avoid technical jargon where possible
- Explain complex concepts in plain terms
- Make it accessible to a general audience`,
    },
    technical: {
        id: 'technical',
        label: 'Technical',
        description: 'More technical depth',
        prompt: `Please make this summary more technical and detailed.
- Include technical terminology where appropriate
- Add specific details and data points
- Use industry-standard language
- Provide deeper technical insights`,
    },
    bulletPoints: {
        id: 'bulletPoints',
        label: 'Bullet Points',
        description: 'Format as bullets',
        prompt: `Please reformat this summary as bullet points.
- Convert paragraphs into clear bullet points
- Each point should be concise and focused
- Organize by main topics or themes
- Maintain logical flow and hierarchy
- Use sub-bullets for details if needed`,
    },
    addDetails: {
        id: 'addDetails',
        label: 'Add Details',
        description: 'Include more information',
        prompt: `Please add more details and depth to this summary.
- Expand on the main points with specific information
- Include relevant examples or data
- Provide more context and background
- Maintain clear organization`,
    },
};

// TODO: reject `custom` without feedback once clients always send it
export const CUSTOM_REFINEMENT_FALLBACK = 'Please improve this summary.';

export const EXAMPLE_INSTRUCTIONS = [
    'Focus on the financial implications',
    'Emphasize the technical implementation details',
    'Highlight the key challenges and solutions',
    'Summarize from a business perspective',
    'Focus on the methodology and approach',
    'Emphasize the results and outcomes',
    'Highlight the main arguments and conclusions',
    'Focus on the timeline and chronology',
];

/** Advisory string matching only. It does not stop a determined prompt injection. */
export const PROHIBITED_PATTERNS = ['ignore previous', 'ignore all', 'disregard', 'forget everything'];

export const CUSTOM_INSTRUCTIONS_MIN = 10;
export const CUSTOM_INSTRUCTIONS_MAX = 1000;
export const FEEDBACK_MIN = 3;
export const FEEDBACK_MAX = 500;

export function hasText(value: string | undefined | null): value is string {
    return typeof value === 'string' && value.trim().length > 0;
}

export function buildInitialPrompt(
    documentKind: DocumentKind,
    size: SummarySize,
    customInstructions?: string,
): string {
    const sizeInfo = SIZE_TEMPLATES[size];
    const customSection = hasText(customInstructions)
        ? `\n\nAdditional Instructions:\n${customInstructions.trim()}`
        : '';

    return `${DOCUMENT_LEAD_INS[documentKind]}

Task: Create a comprehensive summary of this document.

Requirements:
- Length: ${sizeInfo.description}
- Target word count: Approximately ${sizeInfo.wordCount} words
- Style: Clear, concise, and well-structured
- Focus: Key points, main ideas, and important details
- Format: Use paragraphs for readability

${sizeInfo.instructions}${customSection}

Please provide the summary now:`;
}

/**
 * Preset intents map to fixed templates. `custom` sends the feedback verbatim
 * and falls back to a generic instruction when none was given.
 */
export function buildRefinementPrompt(intent: RefinementIntent, customFeedback?: string): string {
    if (intent === 'custom') {
        return hasText(customFeedback) ? customFeedback : CUSTOM_REFINEMENT_FALLBACK;
    }
    return REFINEMENT_ACTIONS[intent].prompt;
}

export function validateCustomInstructions(text: string): void {
    const trimmed = text.trim();
    if (trimmed.length < CUSTOM_INSTRUCTIONS_MIN) {
        throw new ValidationError(
            'TooShort',
            `Custom instructions should be at least ${CUSTOM_INSTRUCTIONS_MIN} characters`,
        );
    }
    if (trimmed.length > CUSTOM_INSTRUCTIONS_MAX) {
        throw new ValidationError(
            'TooLong',
            `Custom instructions should not exceed ${CUSTOM_INSTRUCTIONS_MAX} characters`,
        );
    }
    const lowered = trimmed.toLowerCase();
    if (PROHIBITED_PATTERNS.some(pattern => lowered.includes(pattern))) {
        throw new ValidationError('ProhibitedPattern', 'Instructions contain potentially problematic phrases');
    }
}

export function validateRefinementFeedback(text: string): void {
    const trimmed = text.trim();
    if (trimmed.length < FEEDBACK_MIN) {
        throw new ValidationError('TooShort', `Feedback must be at least ${FEEDBACK_MIN} characters`);
    }
    if (trimmed.length > FEEDBACK_MAX) {
        throw new ValidationError('TooLong', `Feedback must not exceed ${FEEDBACK_MAX} characters`);
    }
}
