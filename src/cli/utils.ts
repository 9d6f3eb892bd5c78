import type {Command} from 'commander'

export type GlobalOptions = {
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Option parser for repeatable flags (`--extra-deps a --extra-deps b`).
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}
