// Types
export type {
    SyllableParts,
    JamoPosition,
    CodepointRole,
    ComposerState,
    Transition,
    MarkedCodepoint,
    ComposeOptions,
    Lookup,
} from './types.js';

// Classifier and syllable arithmetic
export {
    classify,
    decompose,
    compose,
    isNullOnset,
    leadIndexOf,
    tailIndexOf,
    vowelIndexOf,
    isHangulSyllable,
    joinJamo,
    ONSETS,
    VOWELS,
    CODAS,
    NULL_ONSET,
    FILLER_VOWEL,
} from './jamo.js';

// Syllable buffer
export { SyllableBuffer, synthesize } from './buffer.js';
export type { SyllableSlots } from './buffer.js';

// Composer
export {
    HangulComposer,
    composeJamo,
    composeCodepoints,
    readMarked,
    placeJamo,
    TRANSITIONS,
    DEFAULT_TAIL_MARKER,
} from './composer.js';

// Dictionary lookup
export { PronunciationDictionary, parseDictionary, normalizeWord, splitWords } from './dictionary.js';
export type { ParseOptions } from './dictionary.js';

// Pipeline
export { transliterate } from './pipeline.js';
