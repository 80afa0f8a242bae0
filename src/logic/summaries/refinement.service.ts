import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createMessage } from './conversation-log';
import { OperationCancelledError, StateError } from './errors';
import { buildRefinementPrompt, hasText, validateRefinementFeedback } from './prompts';
import { RemoteCallService } from './remote-call.service';
import { SummaryConversation } from './summary-conversation';
import { GenerationPhase, RefinementIntent, RemoteCallOptions, SummaryVersion } from './types';

export const DEFAULT_MAX_REFINEMENTS = 50;

export interface RefineSummaryInput {
    intent: RefinementIntent;
    customFeedback?: string;
}

export type RefinementOutcome =
    | { status: 'committed'; version: SummaryVersion }
    | { status: 'cancelled' };

@Injectable()
export class RefinementService {
    private readonly logger = new Logger(RefinementService.name);

    constructor(
        private readonly remoteCallService: RemoteCallService,
        private readonly configService: ConfigService,
    ) { }

    async refine(
        conversation: SummaryConversation,
        input: RefineSummaryInput,
        options: RemoteCallOptions = {},
    ): Promise<RefinementOutcome> {
        const { signal } = options;
        const phase = (next: GenerationPhase) => options.onPhase?.(next);

        if (!conversation.log.hasAnyModelMessage() || conversation.versions.length === 0) {
            throw new StateError('NoSummaryToRefine', 'No summary to refine');
        }
        const limit = this.configService.get<number>('MAX_REFINEMENTS', DEFAULT_MAX_REFINEMENTS);
        if (conversation.refinementCount >= limit) {
            throw new StateError('RefinementLimitReached', `Refinement limit of ${limit} reached`);
        }
        // presets ignore feedback, so only custom feedback is validated
        const feedback = input.intent === 'custom' && hasText(input.customFeedback) ? input.customFeedback.trim() : undefined;
        if (feedback !== undefined) {
            validateRefinementFeedback(feedback);
        }
        if (input.intent === 'custom' && feedback === undefined) {
            this.logger.warn(`Custom refinement without feedback on ${conversation.conversationId}, using the generic instruction`);
        }

        phase('prompting');
        const promptText = buildRefinementPrompt(input.intent, feedback);
        const priorContext = conversation.log.toContextWindow();

        try {
            phase('awaitingRemote');
            const content = await this.remoteCallService.generate({ promptText, priorContext, signal });
            if (signal?.aborted) {
                throw new OperationCancelledError();
            }

            const version: SummaryVersion = {
                content,
                createdAt: new Date(),
                versionNumber: conversation.versions.nextVersionNumber,
                refinementPrompt: promptText,
            };
            conversation.commitExchange(createMessage('user', promptText), createMessage('model', content), version);
            phase('committed');
            this.logger.log(
                `Refined ${conversation.conversationId} (${input.intent}) to version ${version.versionNumber}`,
            );
            return { status: 'committed', version };
        } catch (error) {
            if (error instanceof OperationCancelledError) {
                phase('idle');
                return { status: 'cancelled' };
            }
            phase('failed');
            this.logger.error(`Refinement failed for ${conversation.conversationId}: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
    }
}
