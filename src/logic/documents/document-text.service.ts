import { Injectable, Logger } from '@nestjs/common';
import { extractTextFromBuffer } from '../../utils/textNormalizer';
import { ValidationError } from '../summaries/errors';
import { DocumentMetadata } from '../summaries/types';

/**
 * Degraded path for files the model cannot take as inline data: pulls plain
 * text out locally so it can be inlined into the prompt.
 */
@Injectable()
export class DocumentTextService {
    private readonly logger = new Logger(DocumentTextService.name);

    async extractText(bytes: Buffer | undefined, metadata: DocumentMetadata): Promise<string> {
        if (!bytes || bytes.length === 0) {
            throw new ValidationError(
                'UnreadableDocument',
                'Unable to read file content. The file may be empty or corrupted.',
            );
        }

        let text: string;
        try {
            ({ text } = await extractTextFromBuffer(bytes, metadata.extension));
        } catch (error) {
            this.logger.warn(`Text extraction failed for ${metadata.name}: ${error instanceof Error ? error.message : String(error)}`);
            throw new ValidationError(
                'UnreadableDocument',
                `Unable to read file content from ${metadata.name}.`,
            );
        }

        if (!text) {
            throw new ValidationError(
                'UnreadableDocument',
                'Unable to read file content. The file may be empty or corrupted.',
            );
        }
        this.logger.debug(`Extracted ${text.length} characters from ${metadata.name}`);
        return text;
    }
}
