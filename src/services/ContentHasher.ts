import crypto from 'crypto';

// Parts of a page that change on every request without the page itself changing
const VOLATILE_PATTERNS: RegExp[] = [
    /\d{1,2}:\d{2}:\d{2}/g,
    /\d{1,2}:\d{2}/g,
    /\d{1,2}\/\d{1,2}\/\d{2,4}/g,
    /\d{4}-\d{2}-\d{2}/g,
    /[A-Za-z]{3},\s\d{1,2}\s[A-Za-z]{3}\s\d{4}/g,
    /viewcount["']?\s*:\s*["']?\d+/gi,
    /["']timestamp["']\s*:\s*\d+/g,
    /data-timestamp=["']\d+["']/g,
    /<script\b[\s\S]*?<\/script>/gi,
    /<iframe\b[\s\S]*?<\/iframe>/gi,
    /<ins\b[\s\S]*?<\/ins>/gi,
    /<!--[\s\S]*?-->/g,
];

const MAIN_CONTENT_PATTERNS: RegExp[] = [
    /<article[^>]*>([\s\S]*?)<\/article>/i,
    /<main[^>]*>([\s\S]*?)<\/main>/i,
    /<div[^>]*class=["']content["'][^>]*>([\s\S]*?)<\/div>/i,
    /<div[^>]*class=["']post-content["'][^>]*>([\s\S]*?)<\/div>/i,
    /<div[^>]*id=["']content["'][^>]*>([\s\S]*?)<\/div>/i,
];

export function hash(content: string | Buffer): string {
    return crypto.createHash('sha256').update(content).digest('hex');
}

export function normalizeForComparison(content: string): string {
    let cleaned = content;
    for (const pattern of VOLATILE_PATTERNS) {
        cleaned = cleaned.replace(pattern, '');
    }

    for (const pattern of MAIN_CONTENT_PATTERNS) {
        const match = cleaned.match(pattern);
        if (match && match[1]) {
            cleaned = match[1];
            break;
        }
    }

    return cleaned.replace(/\s+/g, ' ').trim();
}

/**
 * Fingerprint used for change detection: the digest of the page with
 * clocks, counters, scripts and ad slots removed.
 */
export function fingerprint(content: string): string {
    return hash(normalizeForComparison(content));
}
