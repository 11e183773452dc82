/**
 * @fileoverview Text normalization
 *
 * @module domain/text/preprocess
 */

const kWhitespaceRun = /\s+/g;

// Letters, digits, underscore, whitespace and . , ; : ! ? - ( ) survive.
const kDisallowed = /[^\p{L}\p{N}_\s.,;:!?\-()]/gu;

const kDotRun  = /\.{2,}/g;
const kBangRun = /!{2,}/g;

function collapseWhitespace(text: string): string {
    return text.replace(kWhitespaceRun, " ").trim();
}

/**
 * Clean raw document text for matching.
 *
 * Collapses whitespace, replaces disallowed characters with a space,
 * squeezes runs of "." and "!" and collapses whitespace again. Never
 * throws, and normalizing twice gives the same string as normalizing once.
 *
 * @example
 * ```typescript
 * normalizeText("  Pump #3 leaking!!!  Check ASAP...");
 * // "Pump 3 leaking! Check ASAP."
 * ```
 */
export function normalizeText(text: string): string {
    const cleaned = collapseWhitespace(text)
        .replace(kDisallowed, " ")
        .replace(kDotRun, ".")
        .replace(kBangRun, "!");

    return collapseWhitespace(cleaned);
}
