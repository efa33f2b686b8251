import { existsSync, readFileSync } from 'fs'
import { z } from 'zod'
import { InstallError } from './errors'

export const DEFAULT_CONFIG = {
  // Top-level directory searched recursively for scripts
  sourceDir: '.',
  // Where the script copies live
  targetDir: '/usr/local/bin/scripts',
  // Where command links are created; expected to be on PATH
  linkDir: '/usr/local/bin',
  suffix: '.py',
}

const PathSchema = z.string().min(1, 'must not be empty')

// Zod schema for the installer configuration
export const InstallConfigSchema = z.object({
  sourceDir: PathSchema,
  targetDir: PathSchema,
  linkDir: PathSchema,
  suffix: z.string().regex(/^\.[^/]+$/, 'must start with "." and contain no "/"'),
}).strict()

export type InstallConfig = z.infer<typeof InstallConfigSchema>

export const ConfigOverridesSchema = InstallConfigSchema.partial()

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    .join('; ')
}

export function loadConfigFile(filePath: string): ConfigOverrides {
  if (!existsSync(filePath)) {
    throw new InstallError('INVALID_CONFIG', `Config file '${filePath}' not found`, { context: { filePath } })
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'))
  }
  catch (error: unknown) {
    throw new InstallError('INVALID_CONFIG', `Invalid JSON in config file '${filePath}'`, { context: { filePath }, cause: error })
  }

  const parseResult = ConfigOverridesSchema.safeParse(raw)
  if (!parseResult.success) {
    throw new InstallError(
      'INVALID_CONFIG',
      `Invalid config file '${filePath}': ${formatIssues(parseResult.error)}`,
      { context: { filePath } },
    )
  }
  return parseResult.data
}

// Later layers win; undefined values never override an earlier layer
export function resolveConfig(...layers: Array<ConfigOverrides>): InstallConfig {
  const merged: Record<string, string> = { ...DEFAULT_CONFIG }
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value
      }
    }
  }

  const parseResult = InstallConfigSchema.safeParse(merged)
  if (!parseResult.success) {
    throw new InstallError('INVALID_CONFIG', `Invalid configuration: ${formatIssues(parseResult.error)}`)
  }
  return parseResult.data
}
