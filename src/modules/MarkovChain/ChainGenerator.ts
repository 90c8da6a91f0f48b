import { Logger } from '../../util/logger'
const logger = new Logger('MarkovChain | Generator')

import {
    EmptyModelError, InvalidOptionError, InvalidStartKeyError, UnreachableStateError,
    type RandomSource
} from '../../types/types'
import { defaultRandom, getRandomElement, isNonNegativeInteger } from '../../util/functions'
import type { MarkovModel, NgramKey } from './entities/MarkovModel'

export const DEFAULT_CHAIN_LENGTH = 30

/**
 * What the walk does when the current key never appeared with a successor
 * (only the corpus' final n-gram can be such a key):
 * - `wrap`: emit the opening key's tokens and carry on from the opening key
 * - `stop`: end the walk
 * - `throw`: raise {@link UnreachableStateError}
 */
export type DeadEndPolicy = 'wrap' | 'stop' | 'throw'

export interface WalkOptions<T> {
    startKey?: NgramKey<T>
    random?: RandomSource
    onDeadEnd?: DeadEndPolicy
}

/**
 * Unbounded random walk over `model`. The model and start key are checked
 * when this is called, not on the first `next()`.
 * @throws {EmptyModelError}
 * @throws {InvalidStartKeyError}
 */
export function walk<T>(model: MarkovModel<T>, options: WalkOptions<T> = {}): Generator<T, void, undefined> {
    const { random = defaultRandom, onDeadEnd = 'wrap' } = options

    const openingKey = model.openingKey
    if (!openingKey) throw new EmptyModelError()

    let startKey: NgramKey<T>
    if (options.startKey !== undefined) {
        if (!model.has(options.startKey)) throw new InvalidStartKeyError(options.startKey)
        startKey = options.startKey
    } else {
        startKey = model.randomKey(random)
    }

    return steps(model, startKey, openingKey, random, onDeadEnd)
}

function* steps<T>(
    model: MarkovModel<T>,
    startKey: NgramKey<T>,
    openingKey: NgramKey<T>,
    random: RandomSource,
    onDeadEnd: DeadEndPolicy
): Generator<T, void, undefined> {
    let key = startKey
    while (true) {
        const successors = model.successors(key)
        if (!successors) {
            if (onDeadEnd === 'throw') throw new UnreachableStateError(key)
            if (onDeadEnd === 'stop') {
                logger.debug(`Walk stopped at dead-end key ${JSON.stringify(key)}`)
                return
            }
            logger.debug(`Walk wrapped to the opening key from ${JSON.stringify(key)}`)
            yield* openingKey
            key = openingKey
            continue
        }

        const x = getRandomElement(successors, random)
        yield x
        key = [...key.slice(1), x]
    }
}

/**
 * Bounded walk. Returns exactly `length` tokens unless `onDeadEnd` is `stop`
 * and the walk reaches a dead end first.
 */
export function generate<T>(model: MarkovModel<T>, length: number = DEFAULT_CHAIN_LENGTH, options: WalkOptions<T> = {}): T[] {
    if (!isNonNegativeInteger(length)) throw new InvalidOptionError('length', length, 'a non-negative integer')
    const chain: T[] = []
    const links = walk(model, options)
    if (length === 0) return chain
    for (const x of links) {
        chain.push(x)
        if (chain.length >= length) break
    }
    return chain
}
