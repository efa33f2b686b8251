import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import type { InstallConfig } from '../../install/config'
import type { Output } from '../../install/types'

export interface Workspace {
  root: string
  sourceDir: string
  targetDir: string
  linkDir: string
  config: InstallConfig
  // Write a file relative to the source directory, creating parent directories
  addFile: (relativePath: string, content: string) => string
  cleanup: () => void
}

// Target directory is left uncreated so tests can observe the installer creating it
export function createWorkspace(): Workspace {
  const root = mkdtempSync(join(tmpdir(), 'install-scripts-'))
  const sourceDir = join(root, 'src')
  const targetDir = join(root, 'opt', 'scripts')
  const linkDir = join(root, 'bin')
  mkdirSync(sourceDir)
  mkdirSync(linkDir)

  return {
    root,
    sourceDir,
    targetDir,
    linkDir,
    config: { sourceDir, targetDir, linkDir, suffix: '.py' },
    addFile: (relativePath, content) => {
      const filePath = join(sourceDir, relativePath)
      mkdirSync(dirname(filePath), { recursive: true })
      writeFileSync(filePath, content)
      // Independent of the process umask
      chmodSync(filePath, 0o644)
      return filePath
    },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  }
}

export function captureOutput(): Output & { lines: Array<string>, text: () => string } {
  const lines: Array<string> = []
  return {
    lines,
    write: (text: string) => lines.push(text),
    text: () => lines.join(''),
  }
}
