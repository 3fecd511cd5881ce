import type {
  HeadState,
  InProgressOperation,
  ReportCommit,
  RepositoryReport,
  StatusEntry
} from '@shared/types'
import {
  attribute,
  block,
  dimmed,
  empty,
  group,
  indicator,
  lines,
  status,
  text,
  type Document
} from './document'

const SHORT_OID = 7

const OPERATION_TITLES: Record<InProgressOperation['kind'], string> = {
  rebase: 'Rebase in progress',
  'rebase-apply': 'Rebase (apply) in progress',
  merge: 'Merge in progress',
  'cherry-pick': 'Cherry-pick in progress',
  revert: 'Revert in progress',
  bisect: 'Bisect in progress'
}

/**
 * Lays out a report the way the status command prints it: branch line,
 * operation in flight, change groups, then unpushed and unpulled commits.
 */
export function buildReportDocument(report: RepositoryReport): Document {
  const staged = report.changes.filter((entry) => entry.location === 'index')
  const worktree = report.changes.filter((entry) => entry.location === 'worktree')
  const unstaged = worktree.filter((entry) => entry.change !== 'new' && entry.change !== 'unknown')
  const untracked = worktree.filter((entry) => entry.change === 'new')
  const ignored = worktree.filter((entry) => entry.change === 'unknown')

  return lines([
    headLine(report),
    report.operation ? operationSection(report.operation) : empty,
    changeGroup('Staged', staged),
    changeGroup('Unstaged', unstaged),
    changeGroup('Untracked', untracked),
    changeGroup('Ignored', ignored),
    report.changes.length === 0 ? dimmed('nothing to commit, working tree clean') : empty,
    commitGroup('Unmerged into remote', report.aheadCommits),
    commitGroup('Unpulled from remote', report.behindCommits)
  ])
}

function headLine(report: RepositoryReport): Document {
  return block(headDescription(report.head), upstreamDescription(report))
}

function headDescription(head: HeadState): Document {
  switch (head.kind) {
    case 'branch':
      return block(text('On branch '), attribute('branch', head.branch))
    case 'detached':
      return block(text('HEAD detached at '), attribute('commit', head.oid.slice(0, SHORT_OID)))
    case 'unborn':
      return block(
        text('On branch '),
        attribute('branch', head.branch),
        dimmed(' (no commits yet)')
      )
  }
}

function upstreamDescription(report: RepositoryReport): Document {
  if (!report.upstream || !report.divergence) return empty

  const remote = report.upstream.replace(/^refs\/remotes\//, '').replace(/^refs\/heads\//, '')
  const { ahead, behind } = report.divergence
  const counts: Document[] = []
  if (ahead.length > 0) counts.push(status('warning', text(` ↑${ahead.length}`)))
  if (behind.length > 0) counts.push(status('warning', text(` ↓${behind.length}`)))
  if (counts.length === 0) counts.push(status('success', text(' up to date')))

  return block(dimmed(' tracking '), attribute('remote', remote), ...counts)
}

function operationSection(operation: InProgressOperation): Document {
  const title = status('warning', text(OPERATION_TITLES[operation.kind]))

  switch (operation.kind) {
    case 'rebase': {
      const progress = block(
        title,
        dimmed(` (step ${operation.step}/${operation.totalSteps}`),
        dimmed(operation.headName ? `, rebasing ${operation.headName})` : ')')
      )
      if (operation.remaining.length === 0) return progress
      const steps = operation.remaining.map((op) =>
        op.kind === 'exec'
          ? block(attribute('operation', op.kind), text(` ${op.message}`))
          : block(
              attribute('operation', op.kind),
              text(' '),
              attribute('commit', op.target.slice(0, SHORT_OID)),
              text(` ${op.message}`)
            )
      )
      return lines([progress, group('Remaining steps', lines(steps), steps.length)])
    }
    case 'rebase-apply':
      return block(title, dimmed(` (patch ${operation.step}/${operation.totalSteps})`))
    case 'merge':
    case 'cherry-pick':
    case 'revert':
      return block(
        title,
        dimmed(' ('),
        attribute('commit', operation.head.slice(0, SHORT_OID)),
        dimmed(')')
      )
    case 'bisect':
      return title
  }
}

function changeGroup(title: string, entries: StatusEntry[]): Document {
  if (entries.length === 0) return empty
  return group(title, lines(entries.map(changeLine)), entries.length)
}

function changeLine(entry: StatusEntry): Document {
  const target = entry.oldPath ? `${entry.oldPath} → ${entry.path}` : entry.path
  return block(indicator(entry.change), text(target))
}

function commitGroup(title: string, commits: ReportCommit[]): Document {
  if (commits.length === 0) return empty
  return group(
    title,
    lines(
      commits.map((commit) =>
        block(
          attribute('commit', commit.oid.slice(0, SHORT_OID)),
          text(` ${commit.subject}`),
          commit.signed ? dimmed(' (signed)') : empty
        )
      )
    ),
    commits.length
  )
}
