/**
 * Text helpers shared by the reference set and the classifier rules.
 */

/**
 * Lowercase, turn punctuation into spaces, collapse whitespace.
 * "F. Hoffmann-La Roche Ltd." → "f hoffmann la roche ltd"
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')               // Collapse whitespace
        .trim();
}

/**
 * Escape a literal string for use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lowercase domain of an e-mail address, or null when it does not look like one.
 */
export function emailDomain(email: string | null | undefined): string | null {
    if (!email) return null;

    const at = email.lastIndexOf('@');
    if (at <= 0) return null;

    const domain = email.slice(at + 1).trim().toLowerCase().replace(/\.+$/, '');
    return /^[a-z0-9-]+(\.[a-z0-9-]+)+$/.test(domain) ? domain : null;
}
