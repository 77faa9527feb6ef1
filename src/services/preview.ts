import { parseStringPromise } from 'xml2js';

const WORD_BREAKS = new Set([' ', '.', ',', ';', ':', '!', '?', '\n', '\r']);
const SENTENCE_BREAKS = new Set(['.', '!', '?', '\n', '\r']);

const ENTITIES: Array<[RegExp, string]> = [
    [/&nbsp;/g, ' '],
    [/&lt;/g, '<'],
    [/&gt;/g, '>'],
    [/&quot;/g, '"'],
    [/&apos;/g, "'"],
    [/&#39;/g, "'"],
    [/&#x27;/g, "'"],
    [/&ndash;/g, '-'],
    [/&mdash;/g, '-'],
    [/&lsquo;/g, "'"],
    [/&rsquo;/g, "'"],
    [/&ldquo;/g, '"'],
    [/&rdquo;/g, '"'],
    [/&amp;/g, '&'],
];

// Script fragments that leak into page text
const SCRIPT_NOISE: RegExp[] = [
    /function\s*\([^)]*\)\s*\{[^}]*\}/g,
    /\b(?:var|const|let)\s+\w+\s*=/g,
    /\bwindow\.\w+/g,
    /\bdocument\.\w+/g,
    /\/\*[\s\S]*?\*\//g,
    /gtag\([^)]*\)/g,
    /\b(?:dataLayer|googletag|GoogleAnalytics)\b/g,
];

const CONTENT_CONTAINERS: RegExp[] = [
    /<article[^>]*>([\s\S]*?)<\/article>/gi,
    /<main[^>]*>([\s\S]*?)<\/main>/gi,
    /<div[^>]*(?:class|id)=["'](?:content|post-content|entry-content|article-content|story-body)["'][^>]*>([\s\S]*?)<\/div>/gi,
    /<p[^>]*>([\s\S]*?)<\/p>/gi,
];

export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function decodeEntities(text: string): string {
    return ENTITIES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

export function htmlToText(html: string): string {
    const withoutBlocks = html
        .replace(/<script[\s\S]*?<\/script>/gi, ' ')
        .replace(/<style[\s\S]*?<\/style>/gi, ' ')
        .replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ')
        .replace(/<!--[\s\S]*?-->/g, ' ');
    const text = decodeEntities(withoutBlocks.replace(/<[^>]*>/g, ' '));
    return collapseWhitespace(SCRIPT_NOISE.reduce((acc, pattern) => acc.replace(pattern, ' '), text));
}

export function wordBoundary(text: string, maxLength: number): number {
    if (text.length <= maxLength) return text.length;
    for (let i = maxLength - 1; i >= 0; i--) {
        if (WORD_BREAKS.has(text[i])) return i + 1;
    }
    return maxLength;
}

export function sentenceBoundary(text: string, maxLength: number): number {
    if (text.length <= maxLength) return text.length;
    for (let i = maxLength - 1; i >= 0; i--) {
        if (SENTENCE_BREAKS.has(text[i])) return i + 1;
    }
    return wordBoundary(text, maxLength);
}

export function truncate(
    text: string,
    maxLength: number,
    boundary: (text: string, maxLength: number) => number = wordBoundary
): string {
    if (text.length <= maxLength) return text;
    return `${text.slice(0, boundary(text, maxLength)).trimEnd()}...`;
}

function isFeed(content: string): boolean {
    return ['<?xml', '<rss', '<feed', '<item>', '<entry>'].some((marker) => content.includes(marker));
}

function isJson(content: string): boolean {
    return (content.startsWith('{') && content.endsWith('}')) || (content.startsWith('[') && content.endsWith(']'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
    const first: unknown = Array.isArray(node) ? node[0] : node;
    return isRecord(first) ? first[key] : undefined;
}

// xml2js gives a string for plain elements and `{ _: text }` when the element has attributes
function text(node: unknown): string {
    const first: unknown = Array.isArray(node) ? node[0] : node;
    if (typeof first === 'string') return first;
    const inner = child(first, '_');
    return typeof inner === 'string' ? inner : '';
}

async function feedPreview(xml: string, maxLength: number): Promise<string> {
    let document: unknown;
    try {
        document = await parseStringPromise(xml, { explicitArray: false, trim: true });
    } catch {
        return 'RSS/XML content detected, but couldn\'t extract readable content.';
    }

    const channel = child(child(document, 'rss'), 'channel') ?? child(document, 'rdf:RDF');
    const atom = child(document, 'feed');
    const feedTitle = collapseWhitespace(text(child(channel ?? atom, 'title')));
    const entry = channel !== undefined ? child(channel, 'item') : child(atom, 'entry');

    const entryTitle = collapseWhitespace(text(child(entry, 'title')));
    const body = htmlToText(
        text(child(entry, 'content:encoded')) ||
            text(child(entry, 'content')) ||
            text(child(entry, 'description')) ||
            text(child(entry, 'summary'))
    );

    const header = feedTitle ? `📰 ${feedTitle}\n\n` : '';
    const excerpt = [entryTitle, body].filter(Boolean).join(' - ');
    if (excerpt) return header + truncate(excerpt, maxLength);
    if (header) return `${header}[RSS feed detected - content not available]`;
    return 'RSS/XML content detected, but couldn\'t extract readable content.';
}

function htmlPreview(html: string, maxLength: number): string {
    const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i) ?? html.match(/<h1[^>]*>([\s\S]*?)<\/h1>/i);
    const title = titleMatch ? htmlToText(titleMatch[1]) : '';

    let body = '';
    for (const container of CONTENT_CONTAINERS) {
        const parts = Array.from(html.matchAll(container), (match) => match[1]);
        body = htmlToText(parts.join(' '));
        if (body) break;
    }
    if (!body) {
        const bodyMatch = html.match(/<body[^>]*>([\s\S]*)<\/body>/i);
        body = htmlToText(bodyMatch ? bodyMatch[1] : html.replace(/<head[\s\S]*?<\/head>/i, ' '));
    }

    const header = title ? `📰 ${title}\n\n` : '';
    if (body) return header + truncate(body, maxLength, sentenceBoundary);
    if (header) return `${header}[Content not available]`;
    return 'Unable to extract readable content from this page.';
}

/**
 * Builds the short excerpt carried by live update events. Feeds, JSON and
 * HTML are each summarized differently. Body text longer than `maxLength`
 * is cut at a break character and ends with `...`.
 */
export async function extractPreview(content: string, maxLength: number): Promise<string> {
    const trimmed = content.trim();
    if (isFeed(trimmed)) {
        return feedPreview(trimmed, maxLength);
    }
    if (isJson(trimmed)) {
        return `📊 JSON Data\n\n${truncate(trimmed, maxLength)}`;
    }
    return htmlPreview(trimmed, maxLength);
}
