export function normalizeText(s: string): string {
    return s
        .replace(/\r\n/g, "\n")
        .replace(/\t/g, "  ")
        .replace(/[ \u00A0]+/g, " ")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

/** Whitespace-delimited token count; blank text counts as zero words. */
export function countWords(text: string): number {
    const trimmed = text.trim();
    if (!trimmed) return 0;
    return trimmed.split(/\s+/).length;
}

export async function extractTextFromBuffer(
    bytes: Buffer,
    extension: string
): Promise<{ text: string; meta: { pages?: number } }> {
    const ext = extension.toLowerCase();

    if (ext === "pdf") {
        const { default: pdf } = await import("pdf-parse");
        const result = await pdf(bytes);
        return {
            text: normalizeText(result.text || ""),
            meta: { pages: result.numpages }
        };
    }

    if (ext === "docx") {
        const mammoth = await import("mammoth");
        const res = await mammoth.extractRawText({ buffer: bytes });
        return { text: normalizeText(res.value || ""), meta: {} };
    }

    // txt, md, csv, json, xml, rtf and legacy .doc are read as text
    return { text: normalizeText(bytes.toString("utf8")), meta: {} };
}
