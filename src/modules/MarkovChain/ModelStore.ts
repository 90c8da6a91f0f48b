import { Logger, yellow } from '../../util/logger'
const logger = new Logger('MarkovChain | Store')

import { mkdir, readFile, writeFile } from 'fs/promises'
import path from 'path'
import { z } from 'zod'

import { InvalidModelError } from '../../types/types'
import { createKeyCodec, MarkovModel, type KeyCodec } from './entities/MarkovModel'

export const MODEL_FORMAT_VERSION = 1

export type JSONToken = string | number | boolean | null

const JSONTokenSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const modelSchema = <S extends z.ZodTypeAny>(token: S) => z.object({
    version: z.literal(MODEL_FORMAT_VERSION),
    n: z.number().int().positive(),
    openingKey: z.array(token).nullable(),
    entries: z.array(z.tuple([z.array(token), z.array(token)]))
})

const SerializedModelSchema = modelSchema(JSONTokenSchema)
const SerializedWordModelSchema = modelSchema(z.string())

export type SerializedModel = z.infer<typeof SerializedModelSchema>

/**
 * Plain-JSON form of a model. Entry order and successor duplicates are kept.
 * `openingKey` is `null` only for a model without keys.
 */
export function serializeModel<T extends JSONToken>(model: MarkovModel<T>): SerializedModel {
    return {
        version: MODEL_FORMAT_VERSION,
        n: model.n,
        openingKey: model.openingKey ? [...model.openingKey] : null,
        entries: [...model.entries()].map(([key, successors]): [T[], T[]] => [[...key], [...successors]])
    }
}

const invalidModel = (error: z.ZodError) =>
    new InvalidModelError(error.issues.map(issue => ({ path: issue.path, message: issue.message })))

function fromSerialized<T>(data: { n: number, openingKey: T[] | null, entries: [T[], T[]][] }, codec?: KeyCodec<T>) {
    if (data.openingKey === null && data.entries.length > 0) {
        throw new InvalidModelError([{ path: ['openingKey'], message: 'opening key is missing from a model with keys' }])
    }
    return MarkovModel.fromEntries(data.n, data.entries, codec, data.openingKey ?? undefined)
}

/**
 * @throws {InvalidModelError} when `data` does not describe a valid model
 */
export function deserializeModel(data: unknown, codec?: KeyCodec<JSONToken>): MarkovModel<JSONToken> {
    const parsed = SerializedModelSchema.safeParse(data)
    if (!parsed.success) throw invalidModel(parsed.error)
    return fromSerialized(parsed.data, codec)
}

/**
 * Like {@link deserializeModel}, but every token must be a string
 */
export function deserializeWordModel(data: unknown): MarkovModel<string> {
    const parsed = SerializedWordModelSchema.safeParse(data)
    if (!parsed.success) throw invalidModel(parsed.error)
    return fromSerialized<string>(parsed.data)
}

export async function saveModel<T extends JSONToken>(filePath: string, model: MarkovModel<T>) {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(filePath, JSON.stringify(serializeModel(model)))
    logger.ok(`Saved model with ${yellow(model.size)} keys to ${yellow(filePath)}`)
}

async function readModelFile(filePath: string): Promise<unknown> {
    const file = await readFile(filePath, 'utf-8')
    try {
        return JSON.parse(file)
    } catch (e) {
        throw new InvalidModelError([{ path: [], message: `not valid JSON (${e instanceof Error ? e.message : String(e)})` }])
    }
}

/**
 * @throws {InvalidModelError} when the file is not JSON or not a valid model
 */
export async function loadModel(filePath: string): Promise<MarkovModel<JSONToken>> {
    const model = deserializeModel(await readModelFile(filePath))
    logger.ok(`Loaded model with ${yellow(model.size)} keys from ${yellow(filePath)}`)
    return model
}

export async function loadWordModel(filePath: string): Promise<MarkovModel<string>> {
    const model = deserializeWordModel(await readModelFile(filePath))
    logger.ok(`Loaded word model with ${yellow(model.size)} keys from ${yellow(filePath)}`)
    return model
}
