import { chmodSync, copyFileSync, lstatSync, mkdirSync, statSync, symlinkSync, unlinkSync } from 'fs'
import { basename, join, resolve } from 'path'
import type { InstallConfig } from './config'
import { discoverScripts } from './discover'
import { InstallError, toInstallError } from './errors'
import type { InstalledScript, InstallSummary, Output } from './types'

const SEPARATOR = '---------------------'
const SUMMARY_SEPARATOR = '====================='

export function commandNameFor(filename: string, suffix: string): string {
  return filename.endsWith(suffix) ? filename.slice(0, -suffix.length) : filename
}

export function ensureTargetDirectory(config: InstallConfig, output: Output = process.stdout): void {
  output.write(`Ensuring target directory '${config.targetDir}' exists...\n`)
  try {
    mkdirSync(config.targetDir, { recursive: true })
  }
  catch (error: unknown) {
    throw toInstallError(error, `Cannot create target directory '${config.targetDir}'`, { targetDir: config.targetDir })
  }
}

function replaceWithSymlink(target: string, linkPath: string): void {
  const existing = lstatSync(linkPath, { throwIfNoEntry: false })
  if (existing?.isDirectory()) {
    throw new InstallError('OPERATION_FAILED', `Cannot create command link: '${linkPath}' is a directory`, {
      context: { linkPath },
    })
  }
  if (existing) {
    unlinkSync(linkPath)
  }
  symlinkSync(target, linkPath)
}

export function installOne(candidatePath: string, config: InstallConfig, output: Output = process.stdout): InstalledScript {
  const filename = basename(candidatePath)
  const commandName = commandNameFor(filename, config.suffix)
  const scriptPath = join(resolve(config.targetDir), filename)
  const linkPath = join(config.linkDir, commandName)

  output.write(`${SEPARATOR}\n`)
  output.write(`Processing: ${candidatePath}\n`)

  // 1. Copy the script into the target directory
  output.write(`  -> Copying to ${config.targetDir}\n`)
  try {
    // Copying a file onto itself would truncate it
    if (resolve(candidatePath) !== scriptPath) {
      copyFileSync(candidatePath, scriptPath)
    }
  }
  catch (error: unknown) {
    throw toInstallError(error, `Cannot copy '${candidatePath}' to '${scriptPath}'`, { candidatePath, scriptPath })
  }

  // 2. Make it executable for user, group and others
  output.write('  -> Setting executable permission\n')
  try {
    chmodSync(scriptPath, statSync(scriptPath).mode | 0o111)
  }
  catch (error: unknown) {
    throw toInstallError(error, `Cannot make '${scriptPath}' executable`, { scriptPath })
  }

  // 3. Create or replace the command link
  output.write(`  -> Linking command: ${linkPath}\n`)
  try {
    replaceWithSymlink(scriptPath, linkPath)
  }
  catch (error: unknown) {
    throw toInstallError(error, `Cannot link '${linkPath}' to '${scriptPath}'`, { linkPath, scriptPath })
  }

  output.write(`  -> Done: '${commandName}' is now available as a command\n`)

  return { sourcePath: candidatePath, scriptPath, linkPath, commandName }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory()
  }
  catch (error: unknown) {
    // ENOTDIR: some parent of the path is a file
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false
    }
    throw toInstallError(error, `Cannot access source directory '${path}'`, { sourceDir: path })
  }
}

export function runInstall(config: InstallConfig, output: Output = process.stdout): InstallSummary {
  output.write('Starting script installation...\n')
  output.write(`Source directory: ${config.sourceDir}\n`)

  // Nothing is touched until the source directory is known to exist
  if (!isDirectory(config.sourceDir)) {
    throw new InstallError('SOURCE_NOT_FOUND', `Source directory '${config.sourceDir}' does not exist`, {
      context: { sourceDir: config.sourceDir },
    })
  }

  ensureTargetDirectory(config, output)

  // Copies already in the target directory are not candidates again
  const candidates = discoverScripts(config.sourceDir, config.suffix, { skipDirs: [config.targetDir] })
  const installed: Array<InstalledScript> = []
  for (const candidatePath of candidates) {
    installed.push(installOne(candidatePath, config, output))
  }

  output.write(`${SUMMARY_SEPARATOR}\n`)
  const count = installed.length
  if (count === 0) {
    output.write('No scripts found or installed.\n')
  }
  else {
    output.write(`Successfully installed ${count} script${count === 1 ? '' : 's'}.\n`)
  }

  return { installed, count }
}
