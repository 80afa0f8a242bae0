import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
    ApiError,
    Content,
    GoogleGenAI,
    HarmBlockThreshold,
    HarmCategory,
    Part,
    SafetySetting,
} from '@google/genai';
import { classifyRemoteFailure, emptyResponseError } from '../summaries/errors';
import { TextGenerationClient, TextGenerationRequest } from './text-generation.client';

const SAFETY_SETTINGS: SafetySetting[] = [
    HarmCategory.HARM_CATEGORY_HARASSMENT,
    HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
    HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map(category => ({ category, threshold: HarmBlockThreshold.BLOCK_LOW_AND_ABOVE }));

@Injectable()
export class GeminiService implements TextGenerationClient {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly chatModel: string;

    constructor(private readonly configService: ConfigService) {
        this.genAI = new GoogleGenAI({ apiKey: this.configService.get<string>('GEMINI_API_KEY', '') });
        this.chatModel = this.configService.get<string>('GEMINI_MODEL', 'gemini-2.5-flash');
    }

    toContents(request: TextGenerationRequest): Content[] {
        // prior turns replay as text; only the new turn carries the attachment
        const history: Content[] = request.priorContext.map(m => ({
            role: m.role,
            parts: [{ text: m.content }],
        }));

        const parts: Part[] = [{ text: request.promptText }];
        if (request.attachment) {
            parts.push({
                inlineData: {
                    mimeType: request.attachment.mimeType,
                    data: request.attachment.bytes.toString('base64'),
                },
            });
        }
        return [...history, { role: 'user', parts }];
    }

    async generateText(request: TextGenerationRequest): Promise<string> {
        let text: string | undefined;
        try {
            const result = await this.genAI.models.generateContent({
                model: this.chatModel,
                contents: this.toContents(request),
                config: {
                    temperature: 0.7,
                    topK: 40,
                    topP: 0.95,
                    maxOutputTokens: 8192,
                    safetySettings: SAFETY_SETTINGS,
                    abortSignal: request.signal,
                },
            });
            text = result.text;
        } catch (error) {
            const status = error instanceof ApiError ? error.status : undefined;
            const remote = classifyRemoteFailure(error, status);
            this.logger.warn(`generateContent failed (${remote.errorKind}${status ? `, HTTP ${status}` : ''}): ${remote.message}`);
            throw remote;
        }

        if (!text || !text.trim()) {
            throw emptyResponseError();
        }
        return text;
    }
}
