import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentTextService } from '../documents/document-text.service';
import {
    MAX_FILE_SIZE_BYTES,
    assertProcessable,
    canSendNatively,
    documentKind,
} from '../documents/file-metadata';
import { InlineAttachment } from '../gemini/text-generation.client';
import { createMessage } from './conversation-log';
import { OperationCancelledError } from './errors';
import { buildInitialPrompt, hasText, validateCustomInstructions } from './prompts';
import { RemoteCallService } from './remote-call.service';
import { SummaryConversation } from './summary-conversation';
import {
    DocumentMetadata,
    GenerationPhase,
    RemoteCallOptions,
    SummarySize,
    SummaryVersion,
} from './types';

export interface GenerateSummaryInput {
    document: DocumentMetadata;
    bytes?: Buffer;
    size: SummarySize;
    customInstructions?: string;
}

export type GenerationOutcome =
    | { status: 'committed'; conversation: SummaryConversation; version: SummaryVersion }
    | { status: 'cancelled' };

@Injectable()
export class SummaryGenerationService {
    private readonly logger = new Logger(SummaryGenerationService.name);

    constructor(
        private readonly remoteCallService: RemoteCallService,
        private readonly documentTextService: DocumentTextService,
        private readonly configService: ConfigService,
    ) { }

    /**
     * First summary of a session. Resolves `committed` with a brand-new
     * conversation, or `cancelled` when the signal fired; any other failure is
     * thrown and nothing is created.
     */
    async generate(input: GenerateSummaryInput, options: RemoteCallOptions = {}): Promise<GenerationOutcome> {
        const { document, bytes, size } = input;
        const { signal } = options;
        const phase = (next: GenerationPhase) => {
            this.logger.debug(`[${document.name}] ${next}`);
            options.onPhase?.(next);
        };
        phase('idle');

        try {
            assertProcessable(document, this.configService.get<number>('MAX_FILE_SIZE_BYTES', MAX_FILE_SIZE_BYTES));
            const customInstructions = hasText(input.customInstructions) ? input.customInstructions.trim() : undefined;
            if (customInstructions !== undefined) {
                validateCustomInstructions(customInstructions);
            }

            phase('prompting');
            const prompt = buildInitialPrompt(documentKind(document), size, customInstructions);

            let promptText = prompt;
            let attachment: InlineAttachment | undefined;
            if (canSendNatively(document) && bytes && bytes.length > 0) {
                attachment = { bytes, mimeType: document.mimeType };
            } else {
                const text = await this.documentTextService.extractText(bytes, document);
                promptText = `${prompt}\n\nDocument Content:\n${text}`;
            }
            this.logger.log(
                `Generating ${size} summary for ${document.name} (${attachment ? 'inline file' : 'extracted text'}, ${promptText.length} prompt chars)`,
            );

            if (signal?.aborted) {
                throw new OperationCancelledError();
            }
            phase('awaitingRemote');
            const content = await this.remoteCallService.generate({
                promptText,
                priorContext: [],
                attachment,
                signal,
            });
            if (signal?.aborted) {
                throw new OperationCancelledError();
            }

            const conversation = SummaryConversation.create(document, { size, customPrompt: customInstructions });
            const version: SummaryVersion = {
                content,
                createdAt: new Date(),
                versionNumber: 1,
                refinementPrompt: null,
            };
            conversation.commitExchange(
                createMessage('user', promptText, attachment ? `document:${document.documentId}` : undefined),
                createMessage('model', content),
                version,
            );

            phase('committed');
            this.logger.log(`Summary generated for ${document.name}: ${content.length} characters`);
            return { status: 'committed', conversation, version: conversation.versions.latest() ?? version };
        } catch (error) {
            if (error instanceof OperationCancelledError) {
                phase('idle');
                this.logger.log(`Generation cancelled for ${document.name}`);
                return { status: 'cancelled' };
            }
            phase('failed');
            this.logger.error(`Generation failed for ${document.name}: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
    }
}
