import { Logger, red, yellow, setLogDirectory, setLogLevel } from './util/logger'
const logger = new Logger('vokram')

import { readFile } from 'fs/promises'
import yargs from 'yargs'

import { loadConfig, ConfigError, type Config } from './util/config'
import { isPositiveInteger } from './util/functions'
import { MarkovError, SentenceTooShortError } from './types/types'
import {
    buildWordModel, generate, generateSentence, loadWordModel, readLines, saveModel,
    type MarkovModel
} from './modules/MarkovChain'

export interface CliIO {
    stdin: NodeJS.ReadableStream & { isTTY?: boolean }
    stdout: { write(chunk: string): unknown }
}

const NUMERIC_OPTIONS = ['num-words', 'ngram-size', 'min-words', 'max-attempts'] as const

export function createParser(argv: string[], config: Config) {
    return yargs(argv)
        .scriptName('vokram')
        .usage('$0 [files..]\n\nGenerates plausible new sentences from a corpus given as files or on STDIN.')
        .option('num-words', {
            alias: 'w',
            type: 'number',
            default: config.numWords,
            describe: 'Maximum number of words in the resulting sentence'
        })
        .option('ngram-size', {
            alias: 'n',
            type: 'number',
            describe: `Number of words in each model key [default: ${config.ngramSize}]`
        })
        .option('min-words', {
            alias: 'm',
            type: 'number',
            default: config.minWords,
            describe: 'Shortest sentence worth printing'
        })
        .option('max-attempts', {
            alias: 'a',
            type: 'number',
            default: config.maxAttempts,
            describe: 'Generations to try before giving up'
        })
        .option('raw', {
            type: 'boolean',
            default: false,
            describe: 'Print the chain as generated, without sentence trimming'
        })
        .option('start', {
            alias: 's',
            type: 'string',
            describe: 'Start key, as space-separated words'
        })
        .option('save-model', {
            type: 'string',
            describe: 'Write the built model to this JSON file'
        })
        .option('load-model', {
            type: 'string',
            describe: 'Read the model from this JSON file instead of building one'
        })
        .check(args => {
            for (const name of NUMERIC_OPTIONS) {
                const value = args[name]
                if (value !== undefined && !isPositiveInteger(value)) throw new Error(`--${name} must be a positive integer, got: ${String(value)}`)
            }
            // A loaded model keeps the n-gram size and corpus it was built with
            if (args['load-model'] !== undefined) {
                if (args['ngram-size'] !== undefined) throw new Error('--load-model cannot be combined with --ngram-size')
                if (args._.length > 0) throw new Error('--load-model cannot be combined with corpus files')
            }
            return true
        })
        .strictOptions()
        .fail(false)
        .help()
        .version(false)
}

async function readCorpus(files: string[], stdin: CliIO['stdin']): Promise<string | string[]> {
    if (files.length > 0) {
        const contents = await Promise.all(files.map(file => readFile(file, 'utf-8')))
        logger.debug(`Read corpus from ${yellow(files.length)} file(s)`)
        return contents.join('\n')
    }
    if (stdin.isTTY) {
        throw new Error('corpus must be provided on STDIN or as files')
    }
    const lines: string[] = []
    for await (const line of readLines(stdin)) lines.push(line)
    logger.debug(`Read ${yellow(lines.length)} line(s) from STDIN`)
    return lines
}

/**
 * Runs the command line program and resolves to its exit code
 */
export async function run(argv: string[], io: CliIO = { stdin: process.stdin, stdout: process.stdout }, env: NodeJS.ProcessEnv = process.env): Promise<number> {
    let config: Config
    try {
        config = loadConfig(env)
    } catch (e) {
        if (e instanceof ConfigError) {
            logger.error(e.message)
            return 1
        }
        throw e
    }
    setLogLevel(config.logLevel)
    setLogDirectory(config.logDir)

    let minWords = config.minWords
    try {
        const args = await createParser(argv, config).parseAsync()
        minWords = args['min-words']

        let model: MarkovModel<string>
        if (args['load-model']) {
            model = await loadWordModel(args['load-model'])
        } else {
            const corpus = await readCorpus(args._.map(String), io.stdin)
            model = buildWordModel(corpus, args['ngram-size'] ?? config.ngramSize)
            logger.info(`Built model with ${yellow(model.size)} keys`)
        }
        if (args['save-model']) await saveModel(args['save-model'], model)

        const startKey = args.start ? args.start.trim().split(/\s+/) : undefined
        const output = args.raw
            ? generate(model, args['num-words'], { startKey }).join(' ')
            : generateSentence(model, args['num-words'], {
                startKey,
                minWords,
                maxAttempts: args['max-attempts']
            })
        io.stdout.write(`${output}\n`)
        return 0
    } catch (e) {
        if (e instanceof SentenceTooShortError) {
            logger.error(`Could not generate sentence with at least ${minWords} words.`)
        } else if (e instanceof MarkovError) {
            logger.error(`${e.name}: ${red(e.message)}`)
        } else if (e instanceof Error) {
            logger.error(red(e.message))
        } else {
            throw e
        }
        return 1
    }
}
