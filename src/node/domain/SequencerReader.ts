/**
 * Sequencer Reader
 *
 * Parses the rebase todo list into typed steps. File order is the order the
 * steps will be applied; nothing is reordered or deduplicated.
 *
 * Line grammar:
 *   <verb> <commit-id> <message...>   (pick, reword, edit, squash, fixup)
 *   <verb> <command...>               (exec)
 *
 * Empty lines, comments (#) and lines starting with a space are skipped.
 * Any other line that does not parse fails the whole read.
 */

import type { SequencerOp, SequencerOpKind } from '@shared/types'
import fs from 'fs'
import { ZERO_OID } from '../shared/constants'
import { MalformedStateError, NotFoundError } from '../shared/errors'

const VERBS = new Map<string, SequencerOpKind>([
  ['p', 'pick'],
  ['pick', 'pick'],
  ['r', 'reword'],
  ['reword', 'reword'],
  ['e', 'edit'],
  ['edit', 'edit'],
  ['s', 'squash'],
  ['squash', 'squash'],
  ['f', 'fixup'],
  ['fixup', 'fixup'],
  ['x', 'exec'],
  ['exec', 'exec']
])

const COMMIT_LINE = /^(\S+)\s+(\S+)\s+(.*)$/
const EXEC_LINE = /^(\S+)\s+(.+)$/
const COMMIT_ID = /^[0-9a-fA-F]{4,64}$/

export class SequencerReader {
  private constructor() {}

  /**
   * Parses todo text. `source` names the file in error messages.
   *
   * @throws MalformedStateError naming the 1-based line of the first bad step
   */
  static parse(text: string, source = 'git-rebase-todo'): SequencerOp[] {
    const ops: SequencerOp[] = []
    const lines = text.split('\n')

    lines.forEach((raw, i) => {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw
      if (line === '' || line.startsWith('#') || line.startsWith(' ')) return
      ops.push(parseLine(line, i + 1, source))
    })

    return ops
  }

  /**
   * Reads and parses a todo file.
   *
   * @throws NotFoundError when the file does not exist
   */
  static async read(path: string): Promise<SequencerOp[]> {
    let text: string
    try {
      text = await fs.promises.readFile(path, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Sequencer file not found: ${path}`, 'file', error)
      }
      throw error
    }
    return SequencerReader.parse(text, path)
  }
}

function parseLine(line: string, lineNumber: number, source: string): SequencerOp {
  const verb = line.split(/\s/, 1)[0]
  const kind = VERBS.get(verb)
  if (!kind) {
    throw new MalformedStateError(
      `${source}:${lineNumber}: unknown verb "${verb}"`,
      source,
      lineNumber
    )
  }

  if (kind === 'exec') {
    const match = EXEC_LINE.exec(line)
    const command = match?.[2].trim()
    if (!command) {
      throw new MalformedStateError(
        `${source}:${lineNumber}: exec without command`,
        source,
        lineNumber
      )
    }
    return { target: ZERO_OID, kind, message: command }
  }

  const match = COMMIT_LINE.exec(line)
  if (!match) {
    throw new MalformedStateError(
      `${source}:${lineNumber}: expected "<verb> <commit> <message>"`,
      source,
      lineNumber
    )
  }

  const [, , target, message] = match
  if (!COMMIT_ID.test(target)) {
    throw new MalformedStateError(
      `${source}:${lineNumber}: "${target}" is not a commit id`,
      source,
      lineNumber
    )
  }

  return { target: target.toLowerCase(), kind, message }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
