import { EventEmitter } from 'tseep'
import type { JSONResolvable } from '../types/types'
import fs from 'fs'
import path from 'path'

import chalk from 'chalk'
// Force colors to be enabled
chalk.level = 2
// Shortcut for using chalk colors alongside logger
export const { yellow, red, cyan, green, blue } = chalk

export type LogLevel = 'error' | 'warn' | 'info' | 'ok' | 'debug'

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
    debug: 0,
    info: 1,
    ok: 1,
    warn: 2,
    error: 3
}

// Shared by every Logger instance, set once from config by the CLI
const settings: { level: LogLevel, dir: string | null } = {
    level: 'info',
    dir: null
}

export function setLogLevel(level: LogLevel) {
    settings.level = level
}
/**
 * Directory for dated log files. `null` disables file output.
 */
export function setLogDirectory(dir: string | null) {
    settings.dir = dir
}

export class Logger extends EventEmitter<{
    error: (data: JSONResolvable) => void
    warn: (data: JSONResolvable) => void
    info: (data: JSONResolvable) => void
    ok: (data: JSONResolvable) => void
    debug: (data: JSONResolvable) => void
}> {
    file: string | null = null
    module: string | undefined
    constructor(module?: string) {
        super()
        this.module = module
    }
    private _log(level: LogLevel, data: JSONResolvable) {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[settings.level]) return
        // stdout carries generated text, so log lines go to stderr
        console.error(logoutput(level, data, this.module, true))
        this.emit(level, logoutput(level, data, this.module))
        this.writeLogLine(logoutput(level, data, this.module))
    }

    error(data: JSONResolvable) {
        this._log('error', data)
    }
    warn(data: JSONResolvable) {
        this._log('warn', data)
    }
    info(data: JSONResolvable) {
        this._log('info', data)
    }
    ok(data: JSONResolvable) {
        this._log('ok', data)
    }
    debug(data: JSONResolvable) {
        this._log('debug', data)
    }

    _createLogFile(dir: string, date = formatDate()) {
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true })
        const logFile = path.join(dir, `${date}.log`)
        if (!fs.existsSync(logFile)) fs.writeFileSync(logFile, '')
        this.file = logFile
        return logFile
    }
    writeLogLine(str: string) {
        if (!settings.dir) return
        if (!this.file || path.dirname(this.file) !== path.resolve(settings.dir)) {
            this._createLogFile(path.resolve(settings.dir))
        }
        if (this.file) fs.appendFileSync(this.file, `${str}\n`)
    }
}
export function formatDate(d = new Date()) {
    const pad = (n: number) => String(n).padStart(2, '0')
    return `${d.getFullYear()}.${pad(d.getMonth() + 1)}.${pad(d.getDate())}-${pad(d.getHours())}.${pad(d.getMinutes())}.${pad(d.getSeconds())}`
}
export function logoutput(level: LogLevel, data: JSONResolvable, module?: string, formatting = false) {
    let str = ''
    const displayLevelsColored = {
        'error': red('error'),
        'warn' : yellow(' warn'),
        'info' : cyan(' info'),
        'ok'   : green('   ok'),
        'debug': blue('debug')
    }
    const displayLevels = {
        'error': 'error',
        'warn' : ' warn',
        'info' : ' info',
        'ok'   : '   ok',
        'debug': 'debug'
    }
    if (module) str += `${formatDate()} - ${formatting ? displayLevelsColored[level] : displayLevels[level]}: [${module}]`
    else str += `${formatDate()} - ${formatting ? displayLevelsColored[level] : displayLevels[level]}:`
    if (typeof data === 'string') str += ` ${data}`
    else str += ` ${JSON.stringify(data)}`
    return str
}
