// Shared types for the script installer

export interface Output {
  write: (text: string) => unknown
}

export interface InstalledScript {
  sourcePath: string
  scriptPath: string
  linkPath: string
  commandName: string
}

export interface InstallSummary {
  installed: Array<InstalledScript>
  count: number
}
