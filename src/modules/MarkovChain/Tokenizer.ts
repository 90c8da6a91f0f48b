import { createInterface } from 'readline'

/**
 * Yields whitespace-delimited words in corpus order. Punctuation stays
 * attached to its word, so `"end."` is one token.
 * @param corpus a block of text, or any (possibly lazy) sequence of lines
 */
export function* tokenize(corpus: string | Iterable<string>): Generator<string> {
    const lines = typeof corpus === 'string' ? corpus.split(/\r?\n/) : corpus
    for (const line of lines) {
        for (const word of line.split(/\s+/)) {
            if (word.length > 0) yield word
        }
    }
}

/**
 * Overlapping windows of `size` items, stride 1.
 * Yields nothing when the input is shorter than `size`.
 */
export function* ngrams<T>(xs: Iterable<T>, size: number): Generator<readonly T[]> {
    const window: T[] = []
    for (const x of xs) {
        window.push(x)
        if (window.length > size) window.shift()
        if (window.length === size) yield [...window]
    }
}

export async function* readLines(stream: NodeJS.ReadableStream): AsyncGenerator<string> {
    const rl = createInterface({ input: stream, crlfDelay: Infinity })
    try {
        for await (const line of rl) yield line
    } finally {
        rl.close()
    }
}
