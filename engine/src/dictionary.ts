/**
 * Pronunciation dictionary: the lookup stage that turns a word into the
 * phonetic spelling the composer consumes.
 *
 * Text format, one entry per line, word and pronunciation separated by two
 * spaces; lines starting with ";;;" are comments:
 *
 *   ;;; sample
 *   hangul  ㅎㅏ-ㄴㄱㅡ-ㄹ
 *   jamo  ㅈㅏㅁㅗ
 */

import type { Lookup } from './types.js';

export interface ParseOptions {
    /** Remove stress digits (0, 1, 2) and spaces from pronunciations. Defaults to true. */
    stripStress?: boolean;
}

const COMMENT_PREFIX = ';;;';
const SEPARATOR = '  ';
const STRESS_PATTERN = /[012 ]/g;
const TRIM_PATTERN = /^[.,!?;:"'()]+|[.,!?;:"'()]+$/g;

/** Parse dictionary text. Malformed lines are skipped; a repeated word keeps its last entry. */
export function parseDictionary(text: string, options: ParseOptions = {}): Map<string, string> {
    const { stripStress = true } = options;
    const entries = new Map<string, string>();

    for (const rawLine of text.split(/\r?\n/)) {
        if (rawLine.startsWith(COMMENT_PREFIX)) continue;

        const at = rawLine.indexOf(SEPARATOR);
        if (at <= 0) continue;

        const word = rawLine.slice(0, at).toLowerCase();
        let pronunciation = rawLine.slice(at + SEPARATOR.length);
        if (stripStress) {
            pronunciation = pronunciation.replace(STRESS_PATTERN, '');
        }
        if (pronunciation.length === 0) continue;

        entries.set(word, pronunciation);
    }

    return entries;
}

/** Lower-case and trim surrounding punctuation, the form dictionary keys are stored in */
export function normalizeWord(word: string): string {
    return word.toLowerCase().replace(TRIM_PATTERN, '');
}

export class PronunciationDictionary {
    private readonly entries: ReadonlyMap<string, string>;

    constructor(entries: ReadonlyMap<string, string>) {
        this.entries = entries;
    }

    static fromText(text: string, options?: ParseOptions): PronunciationDictionary {
        return new PronunciationDictionary(parseDictionary(text, options));
    }

    get size(): number {
        return this.entries.size;
    }

    has(word: string): boolean {
        return this.entries.has(normalizeWord(word));
    }

    /** Pronunciation of a word, or the word itself (untouched) when it is not listed */
    lookup(word: string): string {
        return this.entries.get(normalizeWord(word)) ?? word;
    }

    /** Look up every whitespace-separated word and join the results with single spaces */
    transliterate(text: string): string {
        return splitWords(text).map((w) => this.lookup(w)).join(' ');
    }

    /** Bound {@link lookup}, usable wherever a {@link Lookup} is expected */
    get lookupFn(): Lookup {
        return (word) => this.lookup(word);
    }
}

export function splitWords(text: string): string[] {
    return text.split(/\s+/).filter((w) => w.length > 0);
}
