/**
 * Korean Hangul Jamo classification and composition arithmetic.
 *
 * Korean syllable blocks (가–힣, U+AC00–U+D7A3) are composed of:
 *   - 초성 (lead consonant): 19 values
 *   - 중성 (vowel/medial): 21 values
 *   - 종성 (tail consonant): 28 values (index 0 = no tail)
 *
 * Formula: syllableCode = 0xAC00 + (lead * 21 + vowel) * 28 + tail
 */

import type { CodepointRole, SyllableParts } from './types.js';

// Lead (초성) consonants — 19 entries
export const ONSETS = [
    'ㄱ', 'ㄲ', 'ㄴ', 'ㄷ', 'ㄸ', 'ㄹ', 'ㅁ', 'ㅂ', 'ㅃ', 'ㅅ',
    'ㅆ', 'ㅇ', 'ㅈ', 'ㅉ', 'ㅊ', 'ㅋ', 'ㅌ', 'ㅍ', 'ㅎ',
] as const;

// Vowel (중성) — 21 entries
export const VOWELS = [
    'ㅏ', 'ㅐ', 'ㅑ', 'ㅒ', 'ㅓ', 'ㅔ', 'ㅕ', 'ㅖ', 'ㅗ', 'ㅘ',
    'ㅙ', 'ㅚ', 'ㅛ', 'ㅜ', 'ㅝ', 'ㅞ', 'ㅟ', 'ㅠ', 'ㅡ', 'ㅢ',
    'ㅣ',
] as const;

// Tail (종성) — 28 entries (index 0 = no tail)
export const CODAS = [
    '', 'ㄱ', 'ㄲ', 'ㄳ', 'ㄴ', 'ㄵ', 'ㄶ', 'ㄷ', 'ㄹ', 'ㄺ',
    'ㄻ', 'ㄼ', 'ㄽ', 'ㄾ', 'ㄿ', 'ㅀ', 'ㅁ', 'ㅂ', 'ㅄ', 'ㅅ',
    'ㅆ', 'ㅇ', 'ㅈ', 'ㅊ', 'ㅋ', 'ㅌ', 'ㅍ', 'ㅎ',
] as const;

export const HANGUL_BASE = 0xAC00;
export const HANGUL_LAST = 0xD7A3;
export const LEAD_COUNT = 19;
export const VOWEL_COUNT = 21;
export const TAIL_COUNT = 28;

// Compatibility consonants (ㄱ–ㅎ)
const COMPAT_FIRST = 0x3131;
const COMPAT_LAST_CONSONANT = 0x314E;

// Conjoining jamo, modern ranges only
const CONJOINING_LEAD_BASE = 0x1100;
const CONJOINING_VOWEL_BASE = 0x1161;
const CONJOINING_TAIL_BASE = 0x11A7; // tail index 1 = U+11A8

/** Lead index of ㅇ, the consonant written before vowel-initial syllables */
export const NULL_ONSET = 11;
/** Vowel index of ㅡ, used when a syllable is synthesized without a vowel */
export const FILLER_VOWEL = 18;

const cp = (char: string): number => char.codePointAt(0) ?? 0;

// Compatibility codepoint -> component index
const COMPAT_TO_LEAD = new Map<number, number>(ONSETS.map((c, i): [number, number] => [cp(c), i]));
const COMPAT_TO_VOWEL = new Map<number, number>(VOWELS.map((c, i): [number, number] => [cp(c), i]));
const COMPAT_TO_TAIL = new Map<number, number>();
CODAS.forEach((c, i) => { if (c) COMPAT_TO_TAIL.set(cp(c), i); });

/** Check if a character is a composed Hangul syllable block (가–힣) */
export function isHangulSyllable(char: string): boolean {
    const code = cp(char);
    return code >= HANGUL_BASE && code <= HANGUL_LAST;
}

/** Lead index of a compatibility consonant, or null if it cannot start a syllable (ㄳ, ㄺ, ...) */
export function leadIndexOf(codepoint: number): number | null {
    return COMPAT_TO_LEAD.get(codepoint) ?? null;
}

/** Tail index of a compatibility consonant, or null if it cannot end a syllable (ㄸ, ㅃ, ㅉ) */
export function tailIndexOf(codepoint: number): number | null {
    return COMPAT_TO_TAIL.get(codepoint) ?? null;
}

/** Vowel index of a compatibility vowel, or null */
export function vowelIndexOf(codepoint: number): number | null {
    return COMPAT_TO_VOWEL.get(codepoint) ?? null;
}

/** Whether a lead index is the null onset ㅇ */
export function isNullOnset(leadIndex: number): boolean {
    return leadIndex === NULL_ONSET;
}

/**
 * Decompose a composed syllable codepoint into component indices.
 * e.g., '한' → { lead: 18, vowel: 0, tail: 4 }
 */
export function decompose(codepoint: number): SyllableParts {
    if (codepoint < HANGUL_BASE || codepoint > HANGUL_LAST) {
        throw new RangeError(`Not a Hangul syllable: U+${codepoint.toString(16).toUpperCase()}`);
    }

    const index = codepoint - HANGUL_BASE;
    return {
        lead: Math.floor(index / (VOWEL_COUNT * TAIL_COUNT)),
        vowel: Math.floor(index / TAIL_COUNT) % VOWEL_COUNT,
        tail: index % TAIL_COUNT,
    };
}

/** Inverse of {@link decompose} */
export function compose(parts: SyllableParts): number {
    const { lead, vowel, tail } = parts;
    if (!Number.isInteger(lead) || lead < 0 || lead >= LEAD_COUNT) {
        throw new RangeError(`Invalid lead index: ${lead}`);
    }
    if (!Number.isInteger(vowel) || vowel < 0 || vowel >= VOWEL_COUNT) {
        throw new RangeError(`Invalid vowel index: ${vowel}`);
    }
    if (!Number.isInteger(tail) || tail < 0 || tail >= TAIL_COUNT) {
        throw new RangeError(`Invalid tail index: ${tail}`);
    }

    return HANGUL_BASE + (lead * VOWEL_COUNT + vowel) * TAIL_COUNT + tail;
}

/** Determine the Hangul role of a codepoint. Anything unrecognised is `other`. */
export function classify(codepoint: number): CodepointRole {
    if (codepoint >= HANGUL_BASE && codepoint <= HANGUL_LAST) {
        return { kind: 'syllable', parts: decompose(codepoint) };
    }

    if (codepoint >= COMPAT_FIRST && codepoint <= COMPAT_LAST_CONSONANT) {
        return { kind: 'consonant', lead: leadIndexOf(codepoint), tail: tailIndexOf(codepoint) };
    }

    const vowel = vowelIndexOf(codepoint);
    if (vowel !== null) {
        return { kind: 'vowel', vowel };
    }

    if (codepoint >= CONJOINING_LEAD_BASE && codepoint < CONJOINING_LEAD_BASE + LEAD_COUNT) {
        return { kind: 'lead', lead: codepoint - CONJOINING_LEAD_BASE };
    }
    if (codepoint >= CONJOINING_VOWEL_BASE && codepoint < CONJOINING_VOWEL_BASE + VOWEL_COUNT) {
        return { kind: 'vowel', vowel: codepoint - CONJOINING_VOWEL_BASE };
    }
    if (codepoint > CONJOINING_TAIL_BASE && codepoint < CONJOINING_TAIL_BASE + TAIL_COUNT) {
        return { kind: 'tail', tail: codepoint - CONJOINING_TAIL_BASE };
    }

    return { kind: 'other' };
}

/**
 * Compose jamo characters into a Hangul syllable block.
 * e.g., ('ㅎ', 'ㅏ', 'ㄴ') → '한'
 *        ('ㄱ', 'ㅏ')      → '가'
 */
export function joinJamo(lead: string, vowel: string, tail?: string | null): string {
    const leadIndex = leadIndexOf(cp(lead));
    const vowelIndex = vowelIndexOf(cp(vowel));
    const tailIndex = tail ? tailIndexOf(cp(tail)) : 0;

    if (leadIndex === null) throw new RangeError(`Invalid lead: ${lead}`);
    if (vowelIndex === null) throw new RangeError(`Invalid vowel: ${vowel}`);
    if (tailIndex === null) throw new RangeError(`Invalid tail: ${tail}`);

    return String.fromCodePoint(compose({ lead: leadIndex, vowel: vowelIndex, tail: tailIndex }));
}
