import type { HistoryEntry } from '@shared/types'
import { attribute, block, dimmed, lines, status, text, type Document } from './document'

const SHORT_OID = 7

export type HistoryLayout = {
  /** One line per commit, without date and author. */
  short?: boolean
}

/**
 * Lays out a commit listing: a signed mark, the short hash and the message,
 * followed by date and author unless the layout is short.
 */
export function buildHistoryDocument(
  entries: HistoryEntry[],
  layout: HistoryLayout = {}
): Document {
  return lines(entries.flatMap((entry) => entryLines(entry, layout.short ?? false)))
}

function entryLines(entry: HistoryEntry, short: boolean): Document[] {
  const mark = entry.signed ? status('success', text('⚿ ')) : text(short ? '  ' : '')
  const heading = block(
    mark,
    attribute('commit', entry.oid.slice(0, SHORT_OID)),
    text(` ${entry.message}`)
  )
  if (short) return [heading]

  return [
    heading,
    dimmed(`Date: ${formatDate(entry.timestampMs)}`),
    dimmed(`Author: ${entry.author}`),
    text('')
  ]
}

/** YYYY-MM-DD HH:MM in UTC. */
function formatDate(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 16).replace('T', ' ')
}
