/**
 * @fileoverview Entity and keyword extraction
 *
 * Regex entity extraction and a lightweight keyword extractor: short
 * runs of content words stand in for noun phrases, followed by the most
 * frequent words.
 *
 * @module domain/text/extraction
 */

import type { KeywordExtractionRules } from "../catalog.js";
import type { ExtractedEntities } from "../types.js";

const kEquipmentPattern   = /\b(engine|motor|pump|valve|turbine|generator|propeller|radar|gps|compass|navigation|steering|hull|deck|bridge|compartment)\b/gi;
const kDatePattern        = /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/g;
const kMeasurementPattern = /\b(\d+(?:\.\d+)?)\s*(meters?|feet|inches|kg|lbs|degrees?|psi|bar)\b/gi;

const kClauseBoundary = /[.,;:!?()]+/;
const kEdgePunctuation = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const kHasLetter = /\p{L}/u;

// Phrase words need at least this many characters.
const kMinPhraseWordLength = 3;

/**
 * Values in first-seen order, without repeats.
 */
export function unique(values: Iterable<string>): string[] {
    return [...new Set(values)];
}

/**
 * Extract equipment, dates and measurements.
 *
 * Locations and personnel are always empty.
 */
export function extractEntities(text: string): ExtractedEntities {
    const equipment    = [...text.matchAll(kEquipmentPattern)].map(match => match[1].toLowerCase());
    const dates        = [...text.matchAll(kDatePattern)].map(match => match[0]);
    const measurements = [...text.matchAll(kMeasurementPattern)].map(match => `${match[1]} ${match[2].toLowerCase()}`);

    return {
        equipment   : unique(equipment),
        locations   : [],
        dates       : unique(dates),
        measurements: unique(measurements),
        personnel   : [],
    };
}

function toWord(token: string): string {
    return token.replace(kEdgePunctuation, "").toLowerCase();
}

/**
 * Runs of consecutive content words inside one clause. Runs of two or
 * three words are kept whole; longer runs become consecutive pairs.
 */
export function extractPhrases(text: string, stopWords: ReadonlySet<string>): string[] {
    const isContentWord = (word: string): boolean =>
        word.length >= kMinPhraseWordLength && kHasLetter.test(word) && !stopWords.has(word);

    const phrases: string[] = [];

    const flush = (run: string[]): void => {
        if (run.length === 2 || run.length === 3) {
            phrases.push(run.join(" "));
        }
        else if (run.length > 3) {
            for (let i = 0; i + 1 < run.length; i += 2) {
                phrases.push(`${run[i]} ${run[i + 1]}`);
            }
        }
    };

    for (const clause of text.split(kClauseBoundary)) {
        let run: string[] = [];

        for (const token of clause.split(/\s+/)) {
            const word = toWord(token);
            if (isContentWord(word)) {
                run.push(word);
                continue;
            }
            flush(run);
            run = [];
        }
        flush(run);
    }

    return unique(phrases);
}

/**
 * Most frequent words, ties broken by first appearance.
 */
export function topWords(text: string, rules: KeywordExtractionRules, stopWords: ReadonlySet<string>): string[] {
    const counts = new Map<string, number>();

    for (const token of text.split(/\s+/)) {
        const word = toWord(token);
        if (word.length < rules.minWordLength || !kHasLetter.test(word) || stopWords.has(word)) {
            continue;
        }
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    // Array.prototype.sort is stable, so insertion order settles ties.
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, rules.topWords)
        .map(([word]) => word);
}

/**
 * Extract up to `maxKeywords` keywords: phrases first, then frequent words.
 */
export function extractKeywords(text: string, rules: KeywordExtractionRules): string[] {
    const stopWords = new Set(rules.stopWords);

    return unique([
        ...extractPhrases(text, stopWords),
        ...topWords(text, rules, stopWords),
    ]).slice(0, rules.maxKeywords);
}

/**
 * Keyword fallback: unique long words in order of appearance.
 */
export function fallbackKeywords(text: string, rules: KeywordExtractionRules): string[] {
    const words = text
        .split(/\s+/)
        .map(toWord)
        .filter(word => word.length >= rules.fallbackMinWordLength);

    return unique(words).slice(0, rules.maxKeywords);
}
