/**
 * Repository State
 *
 * Detects a multi-step operation left in flight (rebase, am-style rebase,
 * merge, cherry-pick, revert, bisect) from the control files git keeps in its
 * directory. Read-only: nothing here resumes or aborts an operation.
 */

import { log } from '@shared/logger'
import type { InProgressOperation, RebaseProgress } from '@shared/types'
import fs from 'fs'
import path from 'path'
import { isMissingFile, SequencerReader } from '../domain/SequencerReader'
import { SEQUENCER_TODO_PATH } from '../shared/constants'
import { MalformedStateError, NotFoundError } from '../shared/errors'

/**
 * The operation in flight, or null when the repository is idle.
 *
 * @throws MalformedStateError when a control file is corrupt
 */
export async function detectOperation(gitdir: string): Promise<InProgressOperation | null> {
  if (await isDirectory(path.join(gitdir, 'rebase-merge'))) {
    return readRebaseState(gitdir)
  }

  if (await isDirectory(path.join(gitdir, 'rebase-apply'))) {
    const dir = 'rebase-apply'
    return {
      kind: 'rebase-apply',
      headName: parseHeadName(await readControlFile(gitdir, `${dir}/head-name`)),
      onto: (await readControlFile(gitdir, `${dir}/onto`)) ?? '',
      originalHead: (await readControlFile(gitdir, `${dir}/orig-head`)) ?? '',
      step: await readCounter(gitdir, `${dir}/next`),
      totalSteps: await readCounter(gitdir, `${dir}/last`)
    }
  }

  const mergeHead = await readControlFile(gitdir, 'MERGE_HEAD')
  if (mergeHead !== null) return { kind: 'merge', head: firstLine(mergeHead) }

  const cherryPickHead = await readControlFile(gitdir, 'CHERRY_PICK_HEAD')
  if (cherryPickHead !== null) return { kind: 'cherry-pick', head: firstLine(cherryPickHead) }

  const revertHead = await readControlFile(gitdir, 'REVERT_HEAD')
  if (revertHead !== null) return { kind: 'revert', head: firstLine(revertHead) }

  if ((await readControlFile(gitdir, 'BISECT_LOG')) !== null) return { kind: 'bisect' }

  return null
}

/**
 * Progress of an interactive or merge-backend rebase, or null when none is running.
 */
export async function readRebaseState(gitdir: string): Promise<RebaseProgress | null> {
  const dir = 'rebase-merge'
  if (!(await isDirectory(path.join(gitdir, dir)))) return null

  // The todo list is gone once the last step has been picked
  let remaining: RebaseProgress['remaining'] = []
  try {
    remaining = await SequencerReader.read(path.join(gitdir, SEQUENCER_TODO_PATH))
  } catch (error) {
    if (!(error instanceof NotFoundError)) throw error
  }

  const state: RebaseProgress = {
    kind: 'rebase',
    headName: parseHeadName(await readControlFile(gitdir, `${dir}/head-name`)),
    onto: (await readControlFile(gitdir, `${dir}/onto`)) ?? '',
    originalHead: (await readControlFile(gitdir, `${dir}/orig-head`)) ?? '',
    step: await readCounter(gitdir, `${dir}/msgnum`),
    totalSteps: await readCounter(gitdir, `${dir}/end`),
    remaining
  }

  log.debug(`[RepositoryState] Rebase ${state.step}/${state.totalSteps}, ${remaining.length} left`)
  return state
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory()
  } catch (error) {
    if (isMissingFile(error)) return false
    throw error
  }
}

/**
 * Trimmed contents of a control file, or null when it does not exist.
 */
async function readControlFile(gitdir: string, name: string): Promise<string | null> {
  try {
    return (await fs.promises.readFile(path.join(gitdir, name), 'utf-8')).trim()
  } catch (error) {
    if (isMissingFile(error)) return null
    throw error
  }
}

async function readCounter(gitdir: string, name: string): Promise<number> {
  const value = await readControlFile(gitdir, name)
  if (value === null) return 0
  if (!/^\d+$/.test(value)) {
    throw new MalformedStateError(`${name}: expected a step number, got "${value}"`, name, 1)
  }
  return Number(value)
}

function parseHeadName(value: string | null): string | null {
  if (!value || value === 'detached HEAD') return null
  return value.replace(/^refs\/heads\//, '')
}

function firstLine(value: string): string {
  return value.split('\n', 1)[0].trim()
}
