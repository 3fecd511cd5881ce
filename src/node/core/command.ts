import { z } from 'zod'
import { ValidationError } from '../shared/errors'
import { DEFAULT_LIMIT } from '../services/HistoryService'

export type Command =
  | { kind: 'status'; repoPath?: string }
  | { kind: 'list'; repoPath?: string; short: boolean; limit: number }

const limitSchema = z.coerce.number().int().min(0)

/**
 * Reads the command line: `list [--short|-s] [--limit|-l N] [repo]`, or `[repo]` for status.
 *
 * @throws ValidationError on an unknown flag or a bad limit
 */
export function parseCommand(argv: string[]): Command {
  if (argv[0] !== 'list') {
    return argv[0] ? { kind: 'status', repoPath: argv[0] } : { kind: 'status' }
  }

  let short = false
  let limit = DEFAULT_LIMIT
  let repoPath: string | undefined
  const args = argv.slice(1)

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--short' || arg === '-s') {
      short = true
    } else if (arg === '--limit' || arg === '-l') {
      const parsed = limitSchema.safeParse(args[++i])
      if (!parsed.success) {
        throw new ValidationError(`Invalid limit: ${args[i] ?? '(missing)'}`, 'limit')
      }
      limit = parsed.data
    } else if (arg.startsWith('-')) {
      throw new ValidationError(`Unknown option: ${arg}`)
    } else {
      repoPath = arg
    }
  }

  return repoPath === undefined
    ? { kind: 'list', short, limit }
    : { kind: 'list', repoPath, short, limit }
}
