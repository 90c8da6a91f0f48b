import { Logger, yellow } from '../../util/logger'
const logger = new Logger('MarkovChain | Builder')

import { InsufficientCorpusError, InvalidOptionError } from '../../types/types'
import { isPositiveInteger } from '../../util/functions'
import { createKeyCodec, MarkovModel, type KeyCodec, type NgramKey } from './entities/MarkovModel'
import { ngrams, tokenize } from './Tokenizer'

export const DEFAULT_NGRAM_SIZE = 2

export interface BuildOptions<T> {
    codec?: KeyCodec<T>
}

/**
 * Accumulates `n + 1` windows into successor lists. Windows never span two
 * `train()` calls. The model returned by `build()` is a frozen copy.
 */
export class NgramChainBuilder<T> {
    private chain = new Map<string, { key: NgramKey<T>, successors: T[] }>()
    private tokenCount = 0
    private readonly codec: KeyCodec<T>

    constructor(public readonly n: number = DEFAULT_NGRAM_SIZE, codec: KeyCodec<T> = createKeyCodec<T>()) {
        if (!isPositiveInteger(n)) throw new InvalidOptionError('n', n, 'a positive integer')
        this.codec = codec
    }

    public train(tokens: Iterable<T>) {
        for (const window of ngrams(this.count(tokens), this.n + 1)) {
            const key = window.slice(0, -1)
            const item = window[window.length - 1]
            const encoded = this.codec.encode(key)

            let node = this.chain.get(encoded)
            if (!node) {
                node = { key, successors: [] }
                this.chain.set(encoded, node)
            }
            node.successors.push(item)
        }
        return this
    }

    public build(): MarkovModel<T> {
        if (this.chain.size === 0) throw new InsufficientCorpusError(this.tokenCount, this.n)
        return MarkovModel.fromEntries(
            this.n,
            [...this.chain.values()].map(node => [node.key, node.successors] as const),
            this.codec
        )
    }

    private *count(tokens: Iterable<T>) {
        for (const token of tokens) {
            this.tokenCount++
            yield token
        }
    }
}

/**
 * Builds a model of `tokens` using n-grams of size `n`.
 * @throws {InsufficientCorpusError} when there are fewer than `n + 1` tokens
 * @throws {InvalidOptionError} when `n` is not a positive integer
 */
export function buildModel<T>(tokens: Iterable<T>, n: number = DEFAULT_NGRAM_SIZE, options: BuildOptions<T> = {}): MarkovModel<T> {
    const model = new NgramChainBuilder<T>(n, options.codec).train(tokens).build()
    logger.debug(`Built model with ${yellow(model.size)} keys and ${yellow(model.pairCount)} transitions (n=${n})`)
    return model
}

/**
 * Word flavour of {@link buildModel}: splits the corpus on whitespace first
 */
export function buildWordModel(corpus: string | Iterable<string>, n: number = DEFAULT_NGRAM_SIZE): MarkovModel<string> {
    return buildModel(tokenize(corpus), n)
}
