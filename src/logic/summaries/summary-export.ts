import { countWords } from '../../utils/textNormalizer';
import { ExportFormat, SummaryVersion } from './types';

export interface ExportedSummary {
    filename: string;
    contentType: string;
    body: string;
}

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

function baseName(documentName: string): string {
    const dot = documentName.lastIndexOf('.');
    const stem = dot > 0 ? documentName.slice(0, dot) : documentName;
    return stem.replace(/[^a-zA-Z0-9_-]+/g, '_') || 'summary';
}

export function exportSummary(documentName: string, version: SummaryVersion, format: ExportFormat): ExportedSummary {
    const title = `Summary of ${documentName}`;
    const meta = `Version ${version.versionNumber} · ${countWords(version.content)} words · ${version.createdAt.toISOString()}`;
    const stem = `${baseName(documentName)}-summary-v${version.versionNumber}`;

    if (format === 'html') {
        const paragraphs = version.content
            .split(/\n\s*\n/)
            .map(p => p.trim())
            .filter(p => p.length > 0)
            .map(p => `<p>${escapeHtml(p).replace(/\n/g, '<br>')}</p>`)
            .join('\n');
        const body = [
            '<!DOCTYPE html>',
            '<html>',
            '<head>',
            '<meta charset="utf-8">',
            `<title>${escapeHtml(title)}</title>`,
            '</head>',
            '<body>',
            `<h1>${escapeHtml(title)}</h1>`,
            `<p><em>${escapeHtml(meta)}</em></p>`,
            paragraphs,
            '</body>',
            '</html>',
            '',
        ].join('\n');
        return { filename: `${stem}.html`, contentType: 'text/html; charset=utf-8', body };
    }

    return {
        filename: `${stem}.md`,
        contentType: 'text/markdown; charset=utf-8',
        body: `# ${title}\n\n_${meta}_\n\n${version.content.trim()}\n`,
    };
}
