/**
 * ReportService - runs every read-side analysis and merges the results.
 *
 * One call produces one point-in-time RepositoryReport:
 * - HEAD state (branch, detached or unborn)
 * - ahead/behind against the configured upstream
 * - classified working copy changes
 * - the multi-step operation in flight, if any
 *
 * Callers must not modify the repository while a report is being built.
 */

import { log } from '@shared/logger'
import type {
  ClassifyOptions,
  CommitRef,
  HeadState,
  ReportCommit,
  RepositoryReport
} from '@shared/types'
import type { ObjectStore } from '../adapters/store'
import { detectOperation } from '../core/repository-state'
import { DivergenceWalker, StatusClassifier } from '../domain'
import { NotFoundError } from '../shared/errors'

export type BuildReportOptions = {
  status?: ClassifyOptions
}

/**
 * Builds the report for the repository behind `store`.
 *
 * @throws UnrelatedHistoryError when the branch and its upstream share no history
 */
export async function buildReport(
  store: ObjectStore,
  options: BuildReportOptions = {}
): Promise<RepositoryReport> {
  const head = await resolveHead(store)
  const upstream = await DivergenceWalker.resolveUpstreamDivergence(store)
  const changes = await StatusClassifier.classify(store, options.status)
  const operation = await detectOperation(store.gitdir)

  const report: RepositoryReport = {
    head,
    upstream: upstream?.upstream ?? null,
    divergence: upstream?.divergence ?? null,
    aheadCommits: upstream ? await describeCommits(store, upstream.divergence.ahead) : [],
    behindCommits: upstream ? await describeCommits(store, upstream.divergence.behind) : [],
    changes,
    operation
  }

  const running = operation?.kind ?? 'none'
  log.debug(`[ReportService] ${head.kind} HEAD, ${changes.length} changes, operation: ${running}`)
  return report
}

/**
 * Where HEAD points: a branch with a commit, a detached commit, or a branch with no commits yet.
 */
export async function resolveHead(store: ObjectStore): Promise<HeadState> {
  const ref = await store.readReference('HEAD')

  if (ref.target.kind === 'direct') {
    const oid = ref.target.oid
    return { kind: 'detached', oid, subject: await readSubject(store, oid) }
  }

  const branch = ref.target.name.replace(/^refs\/heads\//, '')
  let oid: CommitRef
  try {
    oid = await store.resolveRef(ref.target.name)
  } catch (error) {
    if (error instanceof NotFoundError) return { kind: 'unborn', branch }
    throw error
  }
  return { kind: 'branch', branch, oid, subject: await readSubject(store, oid) }
}

async function describeCommits(store: ObjectStore, oids: CommitRef[]): Promise<ReportCommit[]> {
  const commits: ReportCommit[] = []
  for (const oid of oids) {
    const commit = await store.readCommit(oid)
    const signed = commit.signature !== undefined
    commits.push({ oid, subject: subjectOf(commit.message), signed })
  }
  return commits
}

async function readSubject(store: ObjectStore, oid: CommitRef): Promise<string> {
  return subjectOf((await store.readCommit(oid)).message)
}

export function subjectOf(message: string): string {
  return message.split('\n', 1)[0].trim()
}
