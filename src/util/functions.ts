import { randomInt } from 'crypto'
import type { RandomSource } from '../types/types'

export const defaultRandom: RandomSource = max => randomInt(max)

export const getRandomElement = <T>(array: readonly T[], random: RandomSource = defaultRandom): T => {
    if (array.length === 0) throw new RangeError('Cannot pick an element from an empty array')
    const index = random(array.length)
    if (!Number.isInteger(index) || index < 0 || index >= array.length) {
        throw new RangeError(`Random source returned ${index}, expected an integer in [0, ${array.length})`)
    }
    return array[index]
}

export function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0
}

export function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

/**
 * Last character of a token, or an empty string for an empty token
 */
export const lastChar = (token: string) => token.slice(-1)
