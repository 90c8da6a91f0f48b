import { Logger, yellow } from '../../util/logger'
const logger = new Logger('MarkovChain | Sentence')

import {
    EmptyModelError, InvalidOptionError, InvalidStartKeyError, SentenceTooShortError,
    type RandomSource
} from '../../types/types'
import { defaultRandom, getRandomElement, isPositiveInteger, lastChar } from '../../util/functions'
import { DEFAULT_CHAIN_LENGTH, generate, type WalkOptions } from './ChainGenerator'
import type { MarkovModel, NgramKey } from './entities/MarkovModel'

export const SENTENCE_END = ['.', '!', '?', '"', '\''] as const
export const MIN_SENTENCE_LENGTH = 5
export const DEFAULT_MAX_ATTEMPTS = 25

const SENTENCE_END_CHARS: ReadonlySet<string> = new Set(SENTENCE_END)

export interface SentenceOptions extends WalkOptions<string> {
    /** Shortest acceptable sentence, in words */
    minWords?: number
    /** Whole generations to try before giving up */
    maxAttempts?: number
}

export const isSentenceEnd = (word: string) => SENTENCE_END_CHARS.has(lastChar(word))

/**
 * Drops the words after the last sentence-ending word. Returns an empty
 * array when no word ends a sentence.
 */
export function trimToSentence(words: readonly string[]): string[] {
    for (let i = words.length - 1; i >= 0; i--) {
        if (isSentenceEnd(words[i])) return words.slice(0, i + 1)
    }
    return []
}

/**
 * Keys whose last token ends in a full stop, i.e. keys that are likely
 * followed by the first word of a sentence
 */
export function sentenceStartKeys(model: MarkovModel<string>): NgramKey<string>[] {
    return model.keys().filter(key => lastChar(key[key.length - 1]) === '.')
}

function pickStartKey(model: MarkovModel<string>, candidates: readonly NgramKey<string>[], random: RandomSource) {
    if (candidates.length > 0) return getRandomElement(candidates, random)
    return model.randomKey(random)
}

/**
 * Generates something that looks like one or more complete sentences,
 * using at most `numWords` words. Usually returns fewer words than asked for.
 * @throws {SentenceTooShortError} when `maxAttempts` generations all trim below `minWords`
 * @throws {EmptyModelError}
 * @throws {InvalidStartKeyError}
 */
export function generateSentence(model: MarkovModel<string>, numWords: number = DEFAULT_CHAIN_LENGTH, options: SentenceOptions = {}): string {
    const {
        minWords = MIN_SENTENCE_LENGTH,
        maxAttempts = DEFAULT_MAX_ATTEMPTS,
        random = defaultRandom,
        onDeadEnd,
        startKey
    } = options

    if (!isPositiveInteger(numWords)) throw new InvalidOptionError('numWords', numWords, 'a positive integer')
    if (!isPositiveInteger(minWords)) throw new InvalidOptionError('minWords', minWords, 'a positive integer')
    if (!isPositiveInteger(maxAttempts)) throw new InvalidOptionError('maxAttempts', maxAttempts, 'a positive integer')
    if (model.size === 0) throw new EmptyModelError()
    if (startKey !== undefined && !model.has(startKey)) throw new InvalidStartKeyError(startKey)

    // Trimming only ever shortens the chain
    if (numWords < minWords) throw new SentenceTooShortError(numWords, minWords, 0)

    const candidates = startKey === undefined ? sentenceStartKeys(model) : []
    if (startKey === undefined && candidates.length === 0) {
        logger.debug('No key ends in a full stop, starting from random keys')
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const key = startKey ?? pickStartKey(model, candidates, random)
        const words = trimToSentence(generate(model, numWords, { startKey: key, random, onDeadEnd }))
        if (words.length >= minWords) return words.join(' ')
        logger.debug(`Attempt ${yellow(attempt)}/${maxAttempts} trimmed to ${yellow(words.length)} word(s), retrying`)
    }

    throw new SentenceTooShortError(numWords, minWords, maxAttempts)
}
