import { z } from 'zod'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const ConfigSchema = z.object({
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'ok', 'debug']).default('info'),
    LOG_DIR: z.string().min(1).optional(),
    VOKRAM_NGRAM_SIZE: positiveInt(2),
    VOKRAM_NUM_WORDS: positiveInt(30),
    VOKRAM_MIN_WORDS: positiveInt(5),
    VOKRAM_MAX_ATTEMPTS: positiveInt(25)
})

export interface Config {
    logLevel: z.infer<typeof ConfigSchema>['LOG_LEVEL']
    logDir: string | null
    ngramSize: number
    numWords: number
    minWords: number
    maxAttempts: number
}

export class ConfigError extends Error {
    issues: string[]
    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`)
        this.name = 'ConfigError'
        this.issues = issues
    }
}

/**
 * Reads configuration from the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const raw = Object.fromEntries(
        Object.keys(ConfigSchema.shape)
            .map(key => [key, env[key]])
            .filter(([, value]) => value !== undefined && value !== '')
    )
    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
    }
    const data = parsed.data
    return {
        logLevel: data.LOG_LEVEL,
        logDir: data.LOG_DIR ?? null,
        ngramSize: data.VOKRAM_NGRAM_SIZE,
        numWords: data.VOKRAM_NUM_WORDS,
        minWords: data.VOKRAM_MIN_WORDS,
        maxAttempts: data.VOKRAM_MAX_ATTEMPTS
    }
}
