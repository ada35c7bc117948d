const POSTAL_CODE_PATTERN = /\b(\d{5})(?:-\d{4})?\b/;

/** First US-style 5-digit postal code in the text (ZIP+4 reduced to its ZIP) */
export function extractPostalCode(text: string): string | null {
    const match = POSTAL_CODE_PATTERN.exec(text);
    return match?.[1] ?? null;
}

export function isPostalCode(text: string): boolean {
    return /^\d{5}(?:-\d{4})?$/.test(text.trim());
}
