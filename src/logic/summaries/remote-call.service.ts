import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RetryClock, RetryExhaustedError, systemClock, withRetry } from '../../utils/retry';
import {
    TEXT_GENERATION_CLIENT,
    TextGenerationClient,
    TextGenerationRequest,
} from '../gemini/text-generation.client';
import { RemoteError, classifyRemoteFailure } from './errors';

export const RETRY_CLOCK = Symbol('RETRY_CLOCK');

/**
 * Wraps the text generation client with the retry policy: transient failures
 * back off exponentially with jitter, terminal ones fail on the first attempt.
 */
@Injectable()
export class RemoteCallService {
    private readonly logger = new Logger(RemoteCallService.name);
    private readonly clock: RetryClock;

    constructor(
        @Inject(TEXT_GENERATION_CLIENT) private readonly client: TextGenerationClient,
        private readonly configService: ConfigService,
        @Optional() @Inject(RETRY_CLOCK) clock?: RetryClock,
    ) {
        this.clock = clock ?? systemClock;
    }

    async generate(request: TextGenerationRequest): Promise<string> {
        try {
            return await withRetry(
                async () => {
                    try {
                        return await this.client.generateText(request);
                    } catch (error) {
                        throw classifyRemoteFailure(error);
                    }
                },
                {
                    maxAttempts: this.configService.get<number>('RETRY_MAX_ATTEMPTS', 3),
                    initialDelayMs: this.configService.get<number>('RETRY_INITIAL_DELAY_MS', 2000),
                    backoffFactor: 2,
                    jitterRatio: this.configService.get<number>('RETRY_JITTER_RATIO', 0.2),
                    maxTotalDelayMs: this.configService.get<number>('RETRY_MAX_TOTAL_DELAY_MS', 30000),
                    shouldRetry: error => error instanceof RemoteError && error.retryable,
                    onRetry: ({ attempt, delayMs, error }) =>
                        this.logger.warn(
                            `Attempt ${attempt} failed (${error instanceof RemoteError ? error.errorKind : 'unknown'}), retrying in ${delayMs}ms`,
                        ),
                    signal: request.signal,
                    clock: this.clock,
                },
            );
        } catch (error) {
            if (error instanceof RetryExhaustedError) {
                const last = classifyRemoteFailure(error.lastError);
                this.logger.error(`Giving up after ${error.attempts} attempts: ${last.message}`);
                throw last.withAttempts(error.attempts);
            }
            throw error;
        }
    }
}
