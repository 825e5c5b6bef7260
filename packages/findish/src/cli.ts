import chalk from 'chalk'
import { Command, CommanderError } from 'commander'
import { Treeish, TreeishBuildError, WalkError, walkBehaviorSchema } from 'treeish'
import { z, ZodError } from 'zod'
import { getCliLogger, initLogger, logLevelSchema, resetLogger } from './logger'

const log = getCliLogger('walk')

/**
 * Output channels of a run. Tests substitute their own.
 */
export interface CliIo {
  stdout: (line: string) => void
  stderr: (line: string) => void
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
}

const depthSchema = z.coerce.number().int().nonnegative()

/**
 * Options as commander collects them: every value is a string or a flag.
 */
const cliOptionsSchema = z.object({
  minDepth: depthSchema.optional(),
  maxDepth: depthSchema.optional(),
  followLinks: z.boolean().optional(),
  logLevel: logLevelSchema,
})

type Action = (expression: string, options: unknown) => Promise<void>

/**
 * Build the `findish` command.
 *
 * @param defaultLogLevel - Used when `--log-level` is not given
 */
export function createProgram(defaultLogLevel: string, io: CliIo, action: Action): Command {
  return new Command()
    .name('findish')
    .description('Print the filesystem entries a treeish expression denotes')
    .version('0.1.0')
    .argument('<treeish>', 'a path, a glob, or tree::glob')
    .option('--min-depth <n>', 'do not print entries shallower than n')
    .option('--max-depth <n>', 'do not descend below depth n')
    .option('--follow-links', 'walk into symbolic links')
    .option('--log-level <level>', 'debug, info, warning or error', defaultLogLevel)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action(action)
}

/**
 * Run `findish` on the given arguments (without the node and script paths).
 *
 * @returns The process exit code
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = processIo,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let exitCode = 0
  const program = createProgram(env.FINDISH_LOG_LEVEL ?? 'warning', io, async (expression, options) => {
    exitCode = await find(expression, options, io)
  })

  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }
  return exitCode
}

async function find(expression: string, rawOptions: unknown, io: CliIo): Promise<number> {
  let options: z.output<typeof cliOptionsSchema>
  try {
    options = cliOptionsSchema.parse(rawOptions)
  } catch (error) {
    return fail(error, io)
  }

  await initLogger({ level: options.logLevel, write: io.stderr })
  try {
    const treeish = Treeish.parse(expression)
    const behavior = walkBehaviorSchema.parse({
      minDepth: options.minDepth,
      maxDepth: options.maxDepth,
      followLinks: options.followLinks,
    })
    for (const item of treeish.walk(behavior)) {
      if (item instanceof WalkError) {
        log.warn`${item.message}`
      } else {
        io.stdout(item.path)
      }
    }
    return 0
  } catch (error) {
    return fail(error, io)
  } finally {
    await resetLogger()
  }
}

function fail(error: unknown, io: CliIo): number {
  if (error instanceof TreeishBuildError) {
    io.stderr(`${chalk.red('Error:')} ${error.message}`)
    return 1
  }
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    io.stderr(`${chalk.red('Error:')} invalid options (${issues.join('; ')})`)
    return 1
  }
  throw error
}
