import type { ComposeOptions, Lookup } from './types.js';
import { composeJamo } from './composer.js';
import { splitWords } from './dictionary.js';

/**
 * Look up each whitespace-separated word and compose the result.
 * Words the lookup does not know come back unchanged and pass through
 * the composer as ordinary text.
 *
 * @example
 * ```ts
 * const dict = PronunciationDictionary.fromText('hangul  ㅎㅏ-ㄴㄱㅡ-ㄹ');
 * transliterate('Hangul rocks', dict.lookupFn); // '한글 rocks'
 * ```
 */
export function transliterate(text: string, lookup: Lookup, options: ComposeOptions = {}): string {
    return splitWords(text)
        .map((word) => composeJamo(lookup(word), options))
        .join(' ');
}
