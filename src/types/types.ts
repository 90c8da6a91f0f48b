export type JSONResolvable = string | number | boolean | {[key: string]: JSONResolvable} | {[key: string]: JSONResolvable}[] | null

/**
 * Source of uniform random integers in `[0, maxExclusive)`.
 * Defaults to `crypto.randomInt` wherever one is accepted.
 */
export type RandomSource = (maxExclusive: number) => number

/**
 * Readable form of a key for messages. Unlike `JSON.stringify` it accepts every token type.
 */
export function formatKey(key: readonly unknown[]) {
    return `[${key.map(token => typeof token === 'string' ? JSON.stringify(token) : String(token)).join(', ')}]`
}

/**
 * Base class for every error raised by the Markov core
 */
export class MarkovError extends Error {
    constructor(message: string) {
        super(message)
        this.name = new.target.name
    }
}

/**
 * Corpus Too Short Error
 * @param {number} tokenCount - How many tokens the corpus had
 * @param {number} n - The n-gram size that was requested
 */
export class InsufficientCorpusError extends MarkovError {
    tokenCount: number
    n: number
    constructor(tokenCount: number, n: number) {
        super(`Corpus has ${tokenCount} token(s), at least ${n + 1} are needed to build a model with n-gram size ${n}`)
        this.tokenCount = tokenCount
        this.n = n
    }
}

export class EmptyModelError extends MarkovError {
    constructor() {
        super('Model has no keys to generate from')
    }
}

export class InvalidStartKeyError extends MarkovError {
    key: readonly unknown[]
    constructor(key: readonly unknown[]) {
        super(`Start key ${formatKey(key)} is not present in the model`)
        this.key = key
    }
}

/**
 * Raised by the `throw` dead-end policy when the walk reaches a key
 * that never appeared with a successor in the corpus
 */
export class UnreachableStateError extends MarkovError {
    key: readonly unknown[]
    constructor(key: readonly unknown[]) {
        super(`Key ${formatKey(key)} has no successors in the model`)
        this.key = key
    }
}

/**
 * Sentence Too Short Error
 * @param {number} numWords - The requested word count
 * @param {number} minWords - The minimum acceptable word count
 * @param {number} attempts - How many generations were tried
 */
export class SentenceTooShortError extends MarkovError {
    numWords: number
    minWords: number
    attempts: number
    constructor(numWords: number, minWords: number, attempts: number) {
        super(`Could not generate sentence with at least ${minWords} words from ${numWords} requested words after ${attempts} attempt(s)`)
        this.numWords = numWords
        this.minWords = minWords
        this.attempts = attempts
    }
}

export class InvalidOptionError extends MarkovError {
    option: string
    value: unknown
    constructor(option: string, value: unknown, expected: string) {
        super(`Option '${option}' must be ${expected}, got: ${String(value)}`)
        this.option = option
        this.value = value
    }
}

export interface ModelIssue {
    path: (string | number)[]
    message: string
}

export class InvalidModelError extends MarkovError {
    issues: ModelIssue[]
    constructor(issues: ModelIssue[]) {
        super(`Invalid model data: ${issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')}`)
        this.issues = issues
    }
}
