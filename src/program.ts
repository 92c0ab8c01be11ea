import { resolve } from 'node:path'
import { Command, CommanderError } from 'commander'
import { runCodegen } from './codegen/index.js'
import { runGlobCodegen } from './codegen/glob.js'
import { getSearchRoots, getWorkerCount, isDebugEnabled } from './core/config.js'
import { errorMessage } from './core/errors.js'
import { ChalkLogger, type Logger } from './core/logger.js'

interface GenerateFlags {
  input?: string
  output?: string
  separate?: boolean
  verbose?: boolean
}

export interface CliDependencies {
  runCodegen: typeof runCodegen
  runGlobCodegen: typeof runGlobCodegen
  env: Record<string, string | undefined>
  cwd: string
  createLogger: (verbose: boolean) => Logger
}

const defaultDependencies: CliDependencies = {
  runCodegen,
  runGlobCodegen,
  env: process.env,
  cwd: process.cwd(),
  createLogger: (verbose) => new ChalkLogger({ verbose }),
}

/**
 * Build the `schemabind` program. Commands record their exit code in `exit.code`
 * instead of terminating the process.
 */
export function createProgram(deps: CliDependencies, exit: { code: number }): Command {
  const program = new Command()

  program
    .name('schemabind')
    .description('Embed JSON schemas with their resolved definitions into generated TypeScript modules')
    .version('0.1.0')
    .exitOverride()

  program
    .command('generate')
    .description('Generate schema.ts and bind.ts per service. Without --input/--output, runs over every root in SCHEMABIND_PATH.')
    .option('-i, --input <dir>', 'JSON schema input directory')
    .option('-o, --output <dir>', 'TypeScript output directory')
    .option('--separate', 'Generate one service per schema directory instead of one merged service')
    .option('-v, --verbose', 'Print debug output')
    .action(async (flags: GenerateFlags) => {
      const logger = deps.createLogger(flags.verbose === true || isDebugEnabled(deps.env))
      const policy = flags.separate ? 'separate' : 'merge'
      const concurrency = getWorkerCount(deps.env)

      if ((flags.input === undefined) !== (flags.output === undefined)) {
        logger.error('--input and --output must be given together')
        exit.code = 1
        return
      }

      try {
        if (flags.input !== undefined && flags.output !== undefined) {
          const result = await deps.runCodegen({
            input: resolve(deps.cwd, flags.input),
            outputDir: resolve(deps.cwd, flags.output),
            policy,
            logger,
            concurrency,
          })
          logger.info(`embedded ${result.schemas.length} schema(s) into ${result.services.length} service(s)`)
        } else {
          const results = await deps.runGlobCodegen({
            searchRoots: getSearchRoots(deps.env),
            policy,
            logger,
            concurrency,
          })
          logger.info(`generated ${results.length} schema tree(s)`)
        }
      } catch (error) {
        logger.error(errorMessage(error))
        exit.code = 1
      }
    })

  return program
}

/**
 * Parse argv and run. Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: Partial<CliDependencies> = {}): Promise<number> {
  const exit = { code: 0 }
  const program = createProgram({ ...defaultDependencies, ...deps }, exit)
  try {
    await program.parseAsync([...argv])
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }
  return exit.code
}
