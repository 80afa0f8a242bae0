import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../summaries/errors';
import { DocumentKind, DocumentMetadata } from '../summaries/types';

export const MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

export const SUPPORTED_DOCUMENT_EXTENSIONS = ['pdf', 'doc', 'docx', 'txt', 'md', 'rtf', 'csv', 'json', 'xml'];
export const SUPPORTED_IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'webp'];

// Types the model accepts as inline data without local text extraction
const NATIVE_EXTENSIONS = new Set(['pdf', ...SUPPORTED_IMAGE_EXTENSIONS, 'txt', 'md', 'json', 'csv']);

const MIME_BY_EXTENSION: Record<string, string> = {
    pdf: 'application/pdf',
    png: 'image/png',
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    gif: 'image/gif',
    webp: 'image/webp',
    txt: 'text/plain',
    md: 'text/markdown',
    json: 'application/json',
    csv: 'text/csv',
    xml: 'application/xml',
    rtf: 'application/rtf',
    doc: 'application/msword',
    docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

const GENERIC_MIME = 'application/octet-stream';

export interface DocumentInput {
    name: string;
    sizeBytes: number;
    mimeType?: string;
}

export function getFileExtension(filename: string): string {
    const dot = filename.lastIndexOf('.');
    return dot > 0 && dot < filename.length - 1 ? filename.slice(dot + 1).toLowerCase() : '';
}

export function mimeTypeFor(extension: string, declared?: string): string {
    if (declared && declared !== GENERIC_MIME) {
        return declared;
    }
    return MIME_BY_EXTENSION[extension] ?? GENERIC_MIME;
}

export function describeDocument(input: DocumentInput, selectedAt = new Date()): DocumentMetadata {
    const extension = getFileExtension(input.name);
    return {
        documentId: uuidv4(),
        name: input.name,
        sizeBytes: input.sizeBytes,
        extension,
        mimeType: mimeTypeFor(extension, input.mimeType),
        selectedAt,
    };
}

export function documentKind(metadata: Pick<DocumentMetadata, 'extension'>): DocumentKind {
    const ext = metadata.extension;
    if (ext === 'pdf') return 'pdf';
    if (SUPPORTED_IMAGE_EXTENSIONS.includes(ext)) return 'image';
    if (ext === 'txt' || ext === 'md') return 'text';
    if (ext === 'doc' || ext === 'docx') return 'word';
    return 'other';
}

export function canSendNatively(metadata: Pick<DocumentMetadata, 'extension'>): boolean {
    return NATIVE_EXTENSIONS.has(metadata.extension);
}

export function assertProcessable(metadata: DocumentMetadata, maxSizeBytes = MAX_FILE_SIZE_BYTES): void {
    if (metadata.sizeBytes > maxSizeBytes) {
        throw new ValidationError(
            'FileTooLarge',
            `File size exceeds ${formatFileSize(maxSizeBytes)} limit`,
        );
    }
    const supported = [...SUPPORTED_DOCUMENT_EXTENSIONS, ...SUPPORTED_IMAGE_EXTENSIONS];
    if (!supported.includes(metadata.extension)) {
        throw new ValidationError(
            'UnsupportedFileType',
            `Unsupported file type: ${metadata.extension ? `.${metadata.extension}` : '(none)'}`,
        );
    }
}

/** Caller-facing wait estimate; nothing enforces it. */
export function estimateProcessingTimeMs(sizeBytes: number): number {
    const mb = sizeBytes / (1024 * 1024);
    if (mb < 1) return 10_000;
    if (mb < 5) return 30_000;
    return 60_000;
}

export function formatFileSize(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}
