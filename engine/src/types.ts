/** Component indices of a composed syllable block */
export interface SyllableParts {
    lead: number;   // 0–18
    vowel: number;  // 0–20
    tail: number;   // 0–27, 0 = no tail (종성 없음)
}

/** Position of a jamo inside a syllable block (초성 / 중성 / 종성) */
export type JamoPosition = 'lead' | 'medial' | 'tail';

/**
 * Hangul role of a single codepoint.
 *
 * `consonant` is a compatibility consonant (ㄱ–ㅎ) whose position depends on
 * the tail marker; conjoining jamo (U+1100 block) carry their position in the
 * codepoint itself and classify as `lead` / `vowel` / `tail`.
 */
export type CodepointRole =
    | { kind: 'lead'; lead: number }
    | { kind: 'vowel'; vowel: number }
    | { kind: 'tail'; tail: number }
    | { kind: 'consonant'; lead: number | null; tail: number | null }
    | { kind: 'syllable'; parts: SyllableParts }
    | { kind: 'other' };

/**
 * Furthest syllable position written since the buffer was last restarted.
 * `empty` also covers "the previous codepoint was passed through".
 */
export type ComposerState = 'empty' | 'lead' | 'medial' | 'full';

/** What to do with the open buffer before storing an incoming jamo */
export type Transition = 'extend' | 'restart' | 'extendIfTailOpen';

/** A codepoint as delivered by the marker-aware reader */
export interface MarkedCodepoint {
    codepoint: number;
    markedAsTail: boolean;
}

export interface ComposeOptions {
    /** Character that flags the next consonant as a tail. Defaults to '-'. */
    tailMarker?: string;
}

/** Upstream dictionary stage: maps a word to its phonetic spelling, or returns it unchanged */
export type Lookup = (word: string) => string;
