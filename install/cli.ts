import type { ConfigOverrides } from './config'
import { loadConfigFile, resolveConfig } from './config'
import { InstallError } from './errors'
import { runInstall } from './installer'
import type { Output } from './types'

export interface CliOptions {
  overrides: ConfigOverrides
  configPath: string | null
  help: boolean
}

export interface CliIO {
  stdout: Output
  stderr: Output
}

const valueFlags = new Map<string, keyof ConfigOverrides>([
  ['--source', 'sourceDir'],
  ['--target', 'targetDir'],
  ['--link', 'linkDir'],
  ['--suffix', 'suffix'],
])

export const usage = [
  'Usage: install-scripts [options]',
  '',
  'Copies every script under the source directory into the target directory,',
  'marks it executable and links it into the link directory as a command.',
  '',
  'Options:',
  '  --source <dir>   Directory searched recursively for scripts (default: .)',
  '  --target <dir>   Directory holding installed copies (default: /usr/local/bin/scripts)',
  '  --link <dir>     Directory for command links, should be on PATH (default: /usr/local/bin)',
  '  --suffix <ext>   Script file suffix, stripped to form the command name (default: .py)',
  '  --config <file>  JSON file with sourceDir, targetDir, linkDir and suffix',
  '  --help           Show this help',
  '',
].join('\n')

export function parseArgs(args: Array<string>): CliOptions {
  const result: CliOptions = {
    overrides: {},
    configPath: null,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--help' || arg === '-h') {
      result.help = true
      continue
    }

    const key = arg === '--config' ? null : valueFlags.get(arg)
    if (key === undefined) {
      throw new InstallError('INVALID_ARGUMENT', `Unknown argument: ${arg}`, { context: { arg } })
    }

    const value = args[i + 1]
    if (value === undefined || value.startsWith('--')) {
      throw new InstallError('INVALID_ARGUMENT', `Missing value for ${arg}`, { context: { arg } })
    }
    i++ // skip value

    if (key === null) {
      result.configPath = value
    }
    else {
      result.overrides[key] = value
    }
  }

  return result
}

export function runCli(args: Array<string>, io: CliIO = { stdout: process.stdout, stderr: process.stderr }): number {
  try {
    const opts = parseArgs(args)
    if (opts.help) {
      io.stdout.write(usage)
      return 0
    }

    const fileOverrides = opts.configPath === null ? {} : loadConfigFile(opts.configPath)
    const config = resolveConfig(fileOverrides, opts.overrides)
    runInstall(config, io.stdout)
    return 0
  }
  catch (error: unknown) {
    if (error instanceof Error) {
      io.stderr.write(`Error: ${error.message}\n`)
    }
    else {
      io.stderr.write(`Error: ${String(error)}\n`)
    }
    if (error instanceof InstallError && error.code === 'PERMISSION_DENIED') {
      io.stderr.write('Re-run with privileges that allow writing to the target and link directories (e.g. sudo).\n')
    }
    return 1
  }
}
