import { stemmer } from "stemmer";
import type { Document, TermCounts, Token } from "../types";
import stopWordList from "./stopwords.json";

// Common English stop words, only filtered on request
const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

// Whitespace that separates fragments: ASCII whitespace, the information
// separators U+001C-U+001F, NEL and the Unicode space separators. U+FEFF is not
// a separator and is stripped from inside fragments instead.
const FRAGMENT_SEPARATOR = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export interface TokenizeOptions {
    /** Drop common English function words (default: false) */
    removeStopWords?: boolean;
    /** Reduce tokens to their Porter stem (default: false) */
    applyStemming?: boolean;
}

/**
 * Normalize one whitespace-delimited fragment: strip non-word characters,
 * strip digits, lowercase. Returns "" when nothing survives.
 */
export function normalizeFragment(fragment: string): string {
    return fragment
        .replace(/[^\p{L}\p{N}_]/gu, "") // Keep word characters only (Unicode-aware)
        .replace(/\p{Nd}/gu, "")
        .toLowerCase();
}

/**
 * Tokenize raw text into normalized tokens, preserving order
 * @param text - Input text
 * @param options - Tokenization options
 */
export function tokenize(text: string, options: TokenizeOptions = {}): Token[] {
    const { removeStopWords = false, applyStemming = false } = options;

    const tokens: Token[] = [];
    for (const fragment of text.split(FRAGMENT_SEPARATOR)) {
        let token = normalizeFragment(fragment);
        if (token === "") continue;
        if (removeStopWords && STOP_WORDS.has(token)) continue;
        if (applyStemming) {
            token = stemmer(token);
        }
        tokens.push(token);
    }

    return tokens;
}

/**
 * Count occurrences of each distinct token. Always returns a fresh map,
 * keyed in first-occurrence order.
 */
export function countTerms(tokens: Document): TermCounts {
    const counts = new Map<Token, number>();
    for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}

/**
 * Get unique terms from tokens
 */
export function getUniqueTerms(tokens: Document): Set<Token> {
    return new Set(tokens);
}
