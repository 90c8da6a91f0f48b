import { hideBin } from 'yargs/helpers'
import { run } from './cli'

process.exitCode = await run(hideBin(process.argv))
