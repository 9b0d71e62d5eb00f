/**
 * Jamo-to-syllable composer.
 *
 * Reads a stream of codepoints mixing decomposed jamo, composed syllables and
 * ordinary text, and emits composed syllables with the other text passed
 * through. A consonant preceded by the tail marker ("-ㄴ") is a tail (종성):
 *
 *   composeJamo('ㅎㅏ-ㄴㄱㅡ-ㄹ') → '한글'
 *
 * Every flush decision is a named transition in {@link TRANSITIONS}, keyed by
 * the furthest position written so far and the position of the incoming jamo.
 */

import type {
    CodepointRole,
    ComposeOptions,
    ComposerState,
    JamoPosition,
    MarkedCodepoint,
    SyllableParts,
    Transition,
} from './types.js';
import { classify, isNullOnset } from './jamo.js';
import { SyllableBuffer } from './buffer.js';

export const DEFAULT_TAIL_MARKER = '-';

/**
 * A jamo extends the open syllable only while it moves forward
 * (lead → medial → tail). Going back, or repeating a position, starts a new
 * syllable. A tail right after a medial joins the same syllable while its
 * tail slot is still open.
 */
export const TRANSITIONS: Readonly<Record<ComposerState, Readonly<Record<JamoPosition, Transition>>>> = {
    empty: { lead: 'extend', medial: 'extend', tail: 'extend' },
    lead: { lead: 'restart', medial: 'extend', tail: 'extend' },
    medial: { lead: 'restart', medial: 'restart', tail: 'extendIfTailOpen' },
    full: { lead: 'restart', medial: 'restart', tail: 'restart' },
};

const STATE_AFTER: Record<JamoPosition, ComposerState> = {
    lead: 'lead',
    medial: 'medial',
    tail: 'full',
};

interface JamoPlacement {
    position: JamoPosition;
    index: number;
}

/**
 * Decide which slot a decomposed jamo goes into. Compatibility consonants are
 * leads unless marked; a consonant that only exists in one position (ㄳ can
 * only be a tail, ㄸ only a lead) goes there regardless of the marker.
 */
export function placeJamo(role: CodepointRole, markedAsTail: boolean): JamoPlacement | null {
    switch (role.kind) {
        case 'lead':
            return { position: 'lead', index: role.lead };
        case 'vowel':
            return { position: 'medial', index: role.vowel };
        case 'tail':
            return { position: 'tail', index: role.tail };
        case 'consonant':
            if (markedAsTail && role.tail !== null) return { position: 'tail', index: role.tail };
            if (role.lead !== null) return { position: 'lead', index: role.lead };
            if (role.tail !== null) return { position: 'tail', index: role.tail };
            return null;
        default:
            return null;
    }
}

/**
 * Strip tail markers from the input, flagging the codepoint that follows each
 * one. Repeated markers collapse and a trailing marker is dropped.
 */
export function* readMarked(input: Iterable<number>, marker: number): Generator<MarkedCodepoint> {
    let marked = false;
    for (const codepoint of input) {
        if (codepoint === marker) {
            marked = true;
            continue;
        }
        yield { codepoint, markedAsTail: marked };
        marked = false;
    }
}

/**
 * Incremental composer. Feed codepoints with {@link push}, then call
 * {@link end} to flush the last syllable.
 */
export class HangulComposer {
    private readonly buffer = new SyllableBuffer();
    private readonly out: number[] = [];
    private current: ComposerState = 'empty';

    get state(): ComposerState {
        return this.current;
    }

    /** Codepoints emitted so far. The open syllable is not included until it is flushed. */
    get output(): readonly number[] {
        return this.out;
    }

    push(codepoint: number, markedAsTail = false): void {
        const role = classify(codepoint);

        if (role.kind === 'syllable') {
            this.pushSyllable(role.parts);
            return;
        }

        const placement = placeJamo(role, markedAsTail);
        if (placement === null) {
            this.flush();
            this.out.push(codepoint);
            this.current = 'empty';
            return;
        }

        this.pushJamo(placement);
    }

    /** Flush the open syllable and return everything emitted. */
    end(): number[] {
        this.flush();
        this.current = 'empty';
        return [...this.out];
    }

    reset(): void {
        this.buffer.clear();
        this.out.length = 0;
        this.current = 'empty';
    }

    private pushSyllable(parts: SyllableParts): void {
        // 아, 은, ... right after a bare lead is that lead's vowel written as a syllable
        // attaching keeps the state the bare lead set
        if (this.buffer.hasBareLead() && isNullOnset(parts.lead)) {
            this.buffer.attachVowelCarrier(parts);
            return;
        }
        this.flush();
        this.buffer.load(parts);
        this.current = 'full';
    }

    private pushJamo({ position, index }: JamoPlacement): void {
        const transition = TRANSITIONS[this.current][position];
        if (transition === 'restart' || (transition === 'extendIfTailOpen' && this.buffer.tail !== null)) {
            this.flush();
        }
        this.buffer.set(position, index);
        this.current = STATE_AFTER[position];
    }

    private flush(): void {
        const syllable = this.buffer.flush();
        if (syllable !== null) {
            this.out.push(syllable);
        }
    }
}

function resolveMarker(tailMarker: string = DEFAULT_TAIL_MARKER): number {
    const chars = Array.from(tailMarker);
    if (chars.length !== 1) {
        throw new RangeError(`Tail marker must be a single character, got "${tailMarker}"`);
    }
    const marker = chars[0].codePointAt(0) ?? 0;
    if (classify(marker).kind !== 'other') {
        throw new RangeError(`Tail marker cannot be a Hangul character: "${tailMarker}"`);
    }
    return marker;
}

function toCodepoints(text: string): number[] {
    return Array.from(text, (ch) => ch.codePointAt(0) ?? 0);
}

function fromCodepoints(codepoints: readonly number[]): string {
    return codepoints.map((c) => String.fromCodePoint(c)).join('');
}

/** Compose a codepoint sequence in one pass */
export function composeCodepoints(input: Iterable<number>, options: ComposeOptions = {}): number[] {
    const composer = new HangulComposer();
    for (const { codepoint, markedAsTail } of readMarked(input, resolveMarker(options.tailMarker))) {
        composer.push(codepoint, markedAsTail);
    }
    return composer.end();
}

/**
 * Compose decomposed jamo text into Hangul syllables.
 *
 * @example
 * ```ts
 * composeJamo('ㅈㅏㅁㅗ');   // '자모'
 * composeJamo('ㄱ');         // '그' (missing vowel filled with ㅡ)
 * composeJamo('ㄱ아-ㄴ');    // '간' (아 carries the vowel of ㄱ)
 * ```
 */
export function composeJamo(text: string, options: ComposeOptions = {}): string {
    return fromCodepoints(composeCodepoints(toCodepoints(text), options));
}
