import type { LogLevel } from '../logger'

export type ColorMode = 'always' | 'never'

export type Configuration = {
  repoPath: string
  logLevel: LogLevel
  /** Minimum similarity (percent) for rename and copy detection. */
  renameThreshold: number
  color: ColorMode
}
