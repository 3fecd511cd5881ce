import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MalformedStateError } from '../../shared/errors'
import { detectOperation, readRebaseState } from '../repository-state'

const ONTO = 'a'.repeat(40)
const ORIG_HEAD = 'b'.repeat(40)

describe('repository state', () => {
  let gitdir: string

  beforeEach(async () => {
    gitdir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'gitscope-test-state-'))
  })

  afterEach(async () => {
    await fs.promises.rm(gitdir, { recursive: true, force: true })
  })

  async function writeControl(name: string, content: string): Promise<void> {
    const file = path.join(gitdir, name)
    await fs.promises.mkdir(path.dirname(file), { recursive: true })
    await fs.promises.writeFile(file, content)
  }

  async function writeRebase(todo: string | null): Promise<void> {
    await writeControl('rebase-merge/head-name', 'refs/heads/feature\n')
    await writeControl('rebase-merge/onto', `${ONTO}\n`)
    await writeControl('rebase-merge/orig-head', `${ORIG_HEAD}\n`)
    await writeControl('rebase-merge/msgnum', '2\n')
    await writeControl('rebase-merge/end', '3\n')
    if (todo !== null) await writeControl('rebase-merge/git-rebase-todo', todo)
  }

  it('reports an idle repository', async () => {
    expect(await detectOperation(gitdir)).toBeNull()
    expect(await readRebaseState(gitdir)).toBeNull()
  })

  it('reads an interactive rebase with its remaining steps', async () => {
    await writeRebase('pick abc1234 third commit\nexec make check\n')

    expect(await detectOperation(gitdir)).toEqual({
      kind: 'rebase',
      headName: 'feature',
      onto: ONTO,
      originalHead: ORIG_HEAD,
      step: 2,
      totalSteps: 3,
      remaining: [
        { target: 'abc1234', kind: 'pick', message: 'third commit' },
        { target: '0000000000000000000000000000000000000000', kind: 'exec', message: 'make check' }
      ]
    })
  })

  it('treats a missing todo list as no steps left', async () => {
    await writeRebase(null)

    const state = await readRebaseState(gitdir)

    expect(state?.remaining).toEqual([])
  })

  it('reports a detached rebase without a branch name', async () => {
    await writeRebase('')
    await writeControl('rebase-merge/head-name', 'detached HEAD\n')

    expect((await readRebaseState(gitdir))?.headName).toBeNull()
  })

  it('fails on a corrupt step counter', async () => {
    await writeRebase('')
    await writeControl('rebase-merge/msgnum', 'two\n')

    await expect(detectOperation(gitdir)).rejects.toBeInstanceOf(MalformedStateError)
  })

  it('fails on a corrupt todo list', async () => {
    await writeRebase('frobnicate abc1234 x\n')

    await expect(detectOperation(gitdir)).rejects.toThrow('unknown verb "frobnicate"')
  })

  it('reads an am-style rebase', async () => {
    await writeControl('rebase-apply/head-name', 'refs/heads/topic\n')
    await writeControl('rebase-apply/onto', `${ONTO}\n`)
    await writeControl('rebase-apply/orig-head', `${ORIG_HEAD}\n`)
    await writeControl('rebase-apply/next', '1\n')
    await writeControl('rebase-apply/last', '4\n')

    expect(await detectOperation(gitdir)).toEqual({
      kind: 'rebase-apply',
      headName: 'topic',
      onto: ONTO,
      originalHead: ORIG_HEAD,
      step: 1,
      totalSteps: 4
    })
  })

  it('detects a merge, cherry-pick, revert or bisect', async () => {
    await writeControl('BISECT_LOG', 'git bisect start\n')
    expect(await detectOperation(gitdir)).toEqual({ kind: 'bisect' })

    await writeControl('REVERT_HEAD', `${ONTO}\n`)
    expect(await detectOperation(gitdir)).toEqual({ kind: 'revert', head: ONTO })

    await writeControl('CHERRY_PICK_HEAD', `${ORIG_HEAD}\n`)
    expect(await detectOperation(gitdir)).toEqual({ kind: 'cherry-pick', head: ORIG_HEAD })

    await writeControl('MERGE_HEAD', `${ONTO}\n${ORIG_HEAD}\n`)
    expect(await detectOperation(gitdir)).toEqual({ kind: 'merge', head: ONTO })
  })
})
