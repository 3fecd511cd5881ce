import type { Configuration } from '@shared/types'
import dotenv from 'dotenv'
import { z } from 'zod'
import { DEFAULT_RENAME_THRESHOLD } from '../shared/constants'
import { ValidationError } from '../shared/errors'

const configurationSchema = z.object({
  repoPath: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  renameThreshold: z.number().int().min(0).max(100),
  color: z.enum(['always', 'never'])
})

/**
 * Builds the configuration from environment variables (after loading `.env`).
 *
 * GITSCOPE_REPO_PATH, GITSCOPE_LOG_LEVEL, GITSCOPE_RENAME_THRESHOLD and GITSCOPE_COLOR
 * override the defaults; invalid values throw ValidationError.
 */
export function loadConfiguration(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Configuration> = {}
): Configuration {
  if (env === process.env) {
    dotenv.config()
  }

  const threshold = env.GITSCOPE_RENAME_THRESHOLD
  const candidate = {
    repoPath: env.GITSCOPE_REPO_PATH || process.cwd(),
    logLevel: env.GITSCOPE_LOG_LEVEL || 'info',
    renameThreshold: threshold ? Number(threshold) : DEFAULT_RENAME_THRESHOLD,
    color: env.GITSCOPE_COLOR || (process.stdout.isTTY ? 'always' : 'never'),
    ...overrides
  }

  const result = configurationSchema.safeParse(candidate)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.')
    throw new ValidationError(
      `Invalid configuration: ${field ? `${field}: ` : ''}${issue?.message ?? 'unknown error'}`,
      field
    )
  }

  return result.data
}
