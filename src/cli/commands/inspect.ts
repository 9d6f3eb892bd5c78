import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {extractBundle, readBundle} from '../../core/bundle-reader.js'
import {formatSize} from '../../core/utils.js'
import {getGlobalOptions} from '../utils.js'

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the header and contents of a bundle')
    .argument('<bundle>', 'Bundle file')
    .option('-x, --extract <dir>', 'Also extract the payload into this directory')
    .action(async (bundleFile: string, options: {extract?: string}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const bundlePath = resolve(bundleFile)
      const info = await readBundle(bundlePath)

      if (options.extract) {
        await extractBundle(bundlePath, resolve(options.extract))
      }

      if (json) {
        console.log(JSON.stringify({
          version: info.version,
          skip: info.skip,
          size: info.size,
          sha256: info.sha256,
          entries: info.entries.map(({path, type, size}) => ({path, type, size}))
        }, null, 2))
        return
      }

      console.log(chalk.bold(`\nBundle: ${chalk.cyan(bundlePath)}`))
      console.log(`  Version:  ${info.version ?? chalk.gray('unknown')}`)
      console.log(`  Skip:     ${info.skip}`)
      console.log(`  Size:     ${formatSize(info.size)}`)
      console.log(`  SHA-256:  ${info.sha256}`)
      console.log(`  Entries:  ${info.entries.length}`)
      for (const entry of info.entries) {
        const size = entry.type === 'File' ? formatSize(entry.size) : ''
        console.log(`    ${entry.path.padEnd(48)} ${chalk.gray(size)}`)
      }

      if (options.extract) {
        console.log(chalk.green(`\nExtracted to ${resolve(options.extract)}`))
      }

      console.log()
    })
}
