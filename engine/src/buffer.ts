/**
 * Work-in-progress syllable: three optional slots (초성 / 중성 / 종성)
 * holding component indices, and the synthesizer that turns a possibly
 * incomplete buffer into one composed syllable.
 */

import type { JamoPosition, SyllableParts } from './types.js';
import { compose, FILLER_VOWEL, NULL_ONSET } from './jamo.js';

export interface SyllableSlots {
    lead: number | null;
    medial: number | null;
    tail: number | null;
}

/**
 * Fill missing slots and compose. An empty lead becomes ㅇ, an empty medial
 * becomes ㅡ, an empty tail stays empty.
 */
export function synthesize(slots: SyllableSlots): number {
    return compose({
        lead: slots.lead ?? NULL_ONSET,
        vowel: slots.medial ?? FILLER_VOWEL,
        tail: slots.tail ?? 0,
    });
}

export class SyllableBuffer implements SyllableSlots {
    lead: number | null = null;
    medial: number | null = null;
    tail: number | null = null;

    isEmpty(): boolean {
        return this.lead === null && this.medial === null && this.tail === null;
    }

    /** A lead consonant is waiting for its vowel */
    hasBareLead(): boolean {
        return this.lead !== null && this.medial === null;
    }

    set(position: JamoPosition, index: number): void {
        this[position] = index;
    }

    /** Replace the whole buffer with a composed syllable's parts */
    load(parts: SyllableParts): void {
        this.lead = parts.lead;
        this.medial = parts.vowel;
        this.tail = parts.tail === 0 ? null : parts.tail;
    }

    /**
     * Attach the vowel and tail of a vowel-carrier syllable (아, 은, ...) to
     * the buffered lead. The carrier's tail replaces whatever tail was open.
     */
    attachVowelCarrier(parts: SyllableParts): void {
        this.medial = parts.vowel;
        this.tail = parts.tail === 0 ? null : parts.tail;
    }

    clear(): void {
        this.lead = null;
        this.medial = null;
        this.tail = null;
    }

    /** Synthesize the buffered syllable and clear. Returns null when there is nothing to flush. */
    flush(): number | null {
        if (this.isEmpty()) {
            return null;
        }
        const syllable = synthesize(this);
        this.clear();
        return syllable;
    }
}
