import { readdirSync } from 'fs'
import { join, resolve } from 'path'
import { toInstallError } from './errors'

export interface DiscoverOptions {
  // Directories not descended into, compared after resolving
  skipDirs?: Array<string>
}

function readEntries(dir: string) {
  try {
    return readdirSync(dir, { withFileTypes: true })
  }
  catch (error: unknown) {
    throw toInstallError(error, `Cannot read directory '${dir}'`, { dir })
  }
}

// Lazily walk sourceDir and yield every regular file ending in suffix.
// Symlinks are neither yielded nor followed. Each call starts a fresh traversal.
export function* discoverScripts(
  sourceDir: string,
  suffix: string,
  options: DiscoverOptions = {},
): Generator<string, void, undefined> {
  const skipDirs = new Set((options.skipDirs ?? []).map((dir) => resolve(dir)))
  const pending: Array<string> = [sourceDir]

  while (pending.length > 0) {
    const dir = pending.pop()
    if (dir === undefined) break

    const entries = readEntries(dir).sort((a, b) => a.name.localeCompare(b.name))

    const subdirs: Array<string> = []
    for (const entry of entries) {
      const fullPath = join(dir, entry.name)
      if (entry.isDirectory()) {
        if (!skipDirs.has(resolve(fullPath))) {
          subdirs.push(fullPath)
        }
      }
      // A bare ".py" would leave an empty command name
      else if (entry.isFile() && entry.name.endsWith(suffix) && entry.name.length > suffix.length) {
        yield fullPath
      }
    }

    // Reverse so subdirectories are popped in name order
    pending.push(...subdirs.reverse())
  }
}
