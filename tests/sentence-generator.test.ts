/**
 * Tests for the word-boundary heuristics.
 *
 * CORPUS builds (n=2) the keys, in order:
 *   (A,b.) (b.,C) (C,d) (d,e.) (e.,F) (F,g)
 * Every successor list has one entry, so only the start key pick is random.
 * Keys ending in a full stop: (A,b.) and (d,e.).
 */

import { describe, it, expect } from 'vitest'
import {
    generateSentence, isSentenceEnd, sentenceStartKeys, trimToSentence
} from '../src/modules/MarkovChain/SentenceGenerator'
import { buildWordModel } from '../src/modules/MarkovChain/ModelBuilder'
import { MarkovModel } from '../src/modules/MarkovChain/entities/MarkovModel'
import {
    EmptyModelError, InvalidOptionError, InvalidStartKeyError, SentenceTooShortError
} from '../src/types/types'
import { sequence } from './helpers/random'

const CORPUS = 'A b. C d e. F g h.'
const model = buildWordModel(CORPUS, 2)

describe('isSentenceEnd', () => {
    it('looks at the last character only', () => {
        expect(['end.', 'what?', 'wow!', 'said"', 'it\'', '.'].map(isSentenceEnd)).toEqual([true, true, true, true, true, true])
        expect(['e.g', 'dash-', 'comma,', ''].map(isSentenceEnd)).toEqual([false, false, false, false])
    })
})

describe('trimToSentence', () => {
    it('keeps a chain that already ends a sentence', () => {
        expect(trimToSentence(['Hi', 'there', 'friend!'])).toEqual(['Hi', 'there', 'friend!'])
    })

    it('drops the words after the last sentence end', () => {
        expect(trimToSentence(['Hi.', 'How', 'are', 'you?', 'I', 'am'])).toEqual(['Hi.', 'How', 'are', 'you?'])
    })

    it('returns nothing when no word ends a sentence', () => {
        expect(trimToSentence(['no', 'end', 'here'])).toEqual([])
        expect(trimToSentence([])).toEqual([])
    })
})

describe('sentenceStartKeys', () => {
    it('selects keys whose last word ends in a full stop', () => {
        expect(sentenceStartKeys(model)).toEqual([['A', 'b.'], ['d', 'e.']])
    })

    it('ignores other sentence-ending characters', () => {
        expect(sentenceStartKeys(buildWordModel('a b! c d? e f', 2))).toEqual([])
    })
})

describe('generateSentence', () => {
    it('starts after a full stop and ends on a sentence end', () => {
        // (d,e.) -> F g h. then wraps to the opening key A b. -> C d e.
        expect(generateSentence(model, 8, { random: sequence(1) })).toBe('F g h. A b. C d e.')
    })

    it('trims dangling words', () => {
        expect(generateSentence(model, 7, { random: sequence(1) })).toBe('F g h. A b.')
    })

    it('retries with a new start key when the result is too short', () => {
        // attempt 1 from (d,e.) trims to 5 words, attempt 2 from (A,b.) gives 6
        expect(generateSentence(model, 7, { random: sequence(1), minWords: 6 })).toBe('C d e. F g h.')
    })

    it('reuses a supplied start key', () => {
        expect(generateSentence(model, 8, { startKey: ['A', 'b.'], random: sequence() })).toBe('C d e. F g h. A b.')
    })

    it('handles a corpus where no key ends in a full stop', () => {
        // keys are (The,cat) and (cat,sat); index 0 starts at (The,cat)
        const cat = buildWordModel(['The cat sat .'], 2)
        const expected = Array.from({ length: 30 }, (_, i) => ['sat', '.', 'The', 'cat'][i % 4]).join(' ')
        expect(generateSentence(cat, 30, { random: sequence(0) })).toBe(expected)
    })

    it('meets the minimum length and ends a sentence with real randomness', () => {
        const text = 'The cat sat on the mat. The dog ran to the park! Did the cat see the dog? ' +
            'The dog said "hello." The cat ran away. The end.'
        const words = buildWordModel(text, 2)
        for (let i = 0; i < 50; i++) {
            const sentence = generateSentence(words, 20, { minWords: 4 }).split(' ')
            expect(sentence.length).toBeGreaterThanOrEqual(4)
            expect(sentence.length).toBeLessThanOrEqual(20)
            expect(isSentenceEnd(sentence[sentence.length - 1])).toBe(true)
        }
    })

    it('gives up after maxAttempts when no sentence can be formed', () => {
        const noEnds = buildWordModel('a b c d e f', 2)
        try {
            generateSentence(noEnds, 10, { maxAttempts: 3 })
            expect.unreachable()
        } catch (e) {
            expect(e).toBeInstanceOf(SentenceTooShortError)
            if (e instanceof SentenceTooShortError) {
                expect(e.numWords).toBe(10)
                expect(e.minWords).toBe(5)
                expect(e.attempts).toBe(3)
            }
        }
    })

    it('fails at once when fewer words are requested than the minimum', () => {
        try {
            generateSentence(model, 4)
            expect.unreachable()
        } catch (e) {
            expect(e).toBeInstanceOf(SentenceTooShortError)
            if (e instanceof SentenceTooShortError) expect(e.attempts).toBe(0)
        }
    })

    it('rejects a start key that is not in the model', () => {
        expect(() => generateSentence(model, 10, { startKey: ['no', 'such'] })).toThrow(InvalidStartKeyError)
    })

    it('rejects an empty model', () => {
        expect(() => generateSentence(MarkovModel.fromEntries<string>(2, []), 10)).toThrow(EmptyModelError)
    })

    it('rejects invalid counts', () => {
        expect(() => generateSentence(model, 0)).toThrow(InvalidOptionError)
        expect(() => generateSentence(model, 10, { minWords: 0 })).toThrow(InvalidOptionError)
        expect(() => generateSentence(model, 10, { maxAttempts: 1.5 })).toThrow(InvalidOptionError)
    })
})
