import { describe, it, expect } from 'vitest';
import { parseDictionary, normalizeWord, PronunciationDictionary } from '../src/dictionary.js';
import { transliterate } from '../src/pipeline.js';

const SAMPLE = [
    ';;; sample pronunciations',
    'HANGUL  ㅎㅏ-ㄴㄱㅡ-ㄹ',
    'jamo  ㅈㅏ-ㅁㅗ',
    'abbey  AE1 B IY0',
    'no separator here',
    '  leading separator',
    'empty  ',
    'jamo  ㅈㅏㅁㅗ',
].join('\n');

describe('parseDictionary', () => {
    it('reads entries and skips comments and malformed lines', () => {
        const entries = parseDictionary(SAMPLE);
        expect([...entries.keys()]).toEqual(['hangul', 'jamo', 'abbey']);
    });

    it('keeps the last entry for a repeated word', () => {
        expect(parseDictionary(SAMPLE).get('jamo')).toBe('ㅈㅏㅁㅗ');
    });

    it('strips stress digits and spaces by default', () => {
        expect(parseDictionary(SAMPLE).get('abbey')).toBe('AEBIY');
    });

    it('keeps pronunciations verbatim when stress stripping is off', () => {
        expect(parseDictionary(SAMPLE, { stripStress: false }).get('abbey')).toBe('AE1 B IY0');
    });

    it('accepts CRLF line endings', () => {
        const entries = parseDictionary('a  ㅏ\r\nb  ㅂ\r\n');
        expect(entries.get('a')).toBe('ㅏ');
        expect(entries.get('b')).toBe('ㅂ');
    });
});

describe('normalizeWord', () => {
    it('lower-cases and trims surrounding punctuation', () => {
        expect(normalizeWord('Hangul!')).toBe('hangul');
        expect(normalizeWord('"Jamo",')).toBe('jamo');
        expect(normalizeWord("(don't)")).toBe("don't");
    });
});

describe('PronunciationDictionary', () => {
    const dict = PronunciationDictionary.fromText(SAMPLE);

    it('reports its size and membership', () => {
        expect(dict.size).toBe(3);
        expect(dict.has('Jamo.')).toBe(true);
        expect(dict.has('hanja')).toBe(false);
    });

    it('looks words up case-insensitively', () => {
        expect(dict.lookup('Hangul!')).toBe('ㅎㅏ-ㄴㄱㅡ-ㄹ');
        expect(dict.lookup('JAMO')).toBe('ㅈㅏㅁㅗ');
    });

    it('returns unknown words unchanged', () => {
        expect(dict.lookup('Unknown.')).toBe('Unknown.');
    });

    it('transliterates each word of a text', () => {
        expect(dict.transliterate('  Hangul and\tjamo ')).toBe('ㅎㅏ-ㄴㄱㅡ-ㄹ and ㅈㅏㅁㅗ');
    });
});

describe('transliterate', () => {
    const dict = PronunciationDictionary.fromText(SAMPLE);

    it('looks up and composes each word', () => {
        expect(transliterate('Hangul jamo', dict.lookupFn)).toBe('한글 자모');
    });

    it('passes unknown words through', () => {
        expect(transliterate('Hangul rocks!', dict.lookupFn)).toBe('한글 rocks!');
    });

    it('works with any lookup function', () => {
        const lookup = (word: string): string => (word === 'x' ? 'ㄱ-ㄹ' : word);
        expect(transliterate('x y', lookup)).toBe('글 y');
    });

    it('passes compose options through', () => {
        const lookup = (word: string): string => (word === 'han' ? 'ㅎㅏ+ㄴ' : word);
        expect(transliterate('han', lookup, { tailMarker: '+' })).toBe('한');
    });
});
