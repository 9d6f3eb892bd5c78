import chalk from 'chalk'
import {Command, CommanderError} from 'commander'
import pino from 'pino'
import {PlaypackError} from '../errors.js'
import {VERSION} from '../version.js'
import {registerBuildCommand} from './commands/build.js'
import {registerInspectCommand} from './commands/inspect.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('playpack')
    .description('Package an Ansible playbook into a reproducible self-extracting bundle')
    .version(VERSION)
    .option('--json', 'Output structured JSON logs')
    .exitOverride()

  registerBuildCommand(program)
  registerInspectCommand(program)

  return program
}

function reportFailure(error: unknown, json: boolean): void {
  if (json) {
    const logger = pino({level: 'info'}, pino.destination(2))
    if (error instanceof PlaypackError) {
      logger.error({code: error.code, err: error}, error.message)
    } else {
      logger.error({err: error}, 'Unexpected error')
    }

    return
  }

  if (error instanceof PlaypackError) {
    console.error(chalk.red(`✗ ${error.message}`))
    return
  }

  console.error(chalk.red('Fatal error:'), error)
}

/**
 * Parses `argv` and runs the selected command.
 * Every failure ends up here and maps to exit status 1.
 * @returns Process exit status
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram()

  try {
    await program.parseAsync(argv)
    return 0
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Help and version output also end here
      return error.exitCode === 0 ? 0 : 1
    }

    reportFailure(error, argv.includes('--json'))
    return 1
  }
}
