import { formatKey, InvalidModelError, InvalidOptionError, type ModelIssue, type RandomSource } from '../../../types/types'
import { defaultRandom, getRandomElement, isPositiveInteger } from '../../../util/functions'

export type NgramKey<T> = readonly T[]

/**
 * Turns a key into a string so structurally equal keys share one map slot
 */
export interface KeyCodec<T> {
    encode(key: NgramKey<T>): string
}

/**
 * Default codec. Primitives are told apart by type and value, so `null`,
 * `undefined`, `1`, `1n` and `'1'` are five different tokens, and every `NaN`
 * is the same token. Objects, functions and symbols compare by identity:
 * tokens compared by content need their own codec.
 *
 * Identities are numbered per codec, so each model gets a fresh one.
 */
export function createKeyCodec<T>(): KeyCodec<T> {
    const objectIds = new WeakMap<object, number>()
    const symbolIds = new Map<symbol, number>()
    let nextId = 0

    const objectId = (token: object) => {
        let id = objectIds.get(token)
        if (id === undefined) {
            id = nextId++
            objectIds.set(token, id)
        }
        return id
    }
    const symbolId = (token: symbol) => {
        let id = symbolIds.get(token)
        if (id === undefined) {
            id = nextId++
            symbolIds.set(token, id)
        }
        return id
    }

    const encodeToken = (token: unknown): string => {
        if (token === null) return 'null'
        if (token === undefined) return 'undefined'
        if (typeof token === 'string') return `s${JSON.stringify(token)}`
        if (typeof token === 'number') return `n${token}`
        if (typeof token === 'bigint') return `b${token}`
        if (typeof token === 'boolean') return token ? 'true' : 'false'
        if (typeof token === 'symbol') return `y${symbolId(token)}`
        if (typeof token === 'object' || typeof token === 'function') return `o${objectId(token)}`
        throw new InvalidOptionError('token', token, 'a value the default key codec can encode')
    }

    return { encode: key => key.map(encodeToken).join(',') }
}

export interface MarkovNode<T> {
    key: NgramKey<T>
    successors: readonly T[]
}

/**
 * Read-only n-gram model: each key maps to every token seen right after it,
 * duplicates included. Duplicates are the frequency weighting.
 */
export class MarkovModel<T> {
    public readonly n: number
    public readonly pairCount: number
    private readonly nodes: ReadonlyMap<string, MarkovNode<T>>
    private readonly keyList: readonly NgramKey<T>[]
    private readonly opening: NgramKey<T> | undefined
    private readonly codec: KeyCodec<T>

    private constructor(n: number, nodes: Map<string, MarkovNode<T>>, codec: KeyCodec<T>, opening: NgramKey<T> | undefined) {
        this.n = n
        this.nodes = nodes
        this.codec = codec
        this.keyList = Object.freeze([...nodes.values()].map(node => node.key))
        this.opening = opening ?? this.keyList[0]
        let pairs = 0
        for (const node of nodes.values()) pairs += node.successors.length
        this.pairCount = pairs
        Object.freeze(this)
    }

    /**
     * Builds a model from `[key, successors]` pairs, in order. The opening key
     * defaults to the first key; an explicit one must be one of the keys.
     * @throws {InvalidModelError} on a bad `n`, a key of the wrong length, an empty successor list, a repeated key or an unknown opening key
     */
    public static fromEntries<T>(
        n: number,
        entries: Iterable<readonly [NgramKey<T>, readonly T[]]>,
        codec: KeyCodec<T> = createKeyCodec<T>(),
        openingKey?: NgramKey<T>
    ): MarkovModel<T> {
        if (!isPositiveInteger(n)) {
            throw new InvalidModelError([{ path: ['n'], message: `n-gram size must be a positive integer, got ${String(n)}` }])
        }
        const issues: ModelIssue[] = []
        const nodes = new Map<string, MarkovNode<T>>()
        let index = 0
        for (const [key, successors] of entries) {
            if (key.length !== n) {
                issues.push({ path: ['entries', index, 0], message: `key has ${key.length} token(s), expected ${n}` })
            } else if (successors.length === 0) {
                issues.push({ path: ['entries', index, 1], message: 'successor list is empty' })
            } else {
                const encoded = codec.encode(key)
                if (nodes.has(encoded)) {
                    issues.push({ path: ['entries', index, 0], message: `key ${formatKey(key)} appears more than once` })
                } else {
                    nodes.set(encoded, {
                        key: Object.freeze([...key]),
                        successors: Object.freeze([...successors])
                    })
                }
            }
            index++
        }
        let opening: NgramKey<T> | undefined
        if (openingKey !== undefined) {
            opening = nodes.get(codec.encode(openingKey))?.key
            if (!opening) issues.push({ path: ['openingKey'], message: `opening key ${formatKey(openingKey)} is not a key of the model` })
        }
        if (issues.length) throw new InvalidModelError(issues)
        return new MarkovModel(n, nodes, codec, opening)
    }

    public get size() {
        return this.nodes.size
    }

    /**
     * The first `n` tokens of the corpus, or `undefined` for an empty model
     */
    public get openingKey(): NgramKey<T> | undefined {
        return this.opening
    }

    public has(key: NgramKey<T>) {
        return key.length === this.n && this.nodes.has(this.codec.encode(key))
    }

    public successors(key: NgramKey<T>): readonly T[] | undefined {
        if (key.length !== this.n) return undefined
        return this.nodes.get(this.codec.encode(key))?.successors
    }

    public keys(): readonly NgramKey<T>[] {
        return this.keyList
    }

    public *entries(): Generator<[NgramKey<T>, readonly T[]]> {
        for (const node of this.nodes.values()) yield [node.key, node.successors]
    }

    public randomKey(random: RandomSource = defaultRandom): NgramKey<T> {
        return getRandomElement(this.keyList, random)
    }
}
