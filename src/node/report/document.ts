/**
 * Document Model
 *
 * A closed set of node variants describing terminal output independently of
 * how it is coloured. Build a tree with the helpers below and hand it to
 * `renderDocument`.
 */

import type { StatusChange } from '@shared/types'

export type AttributeKind = 'branch' | 'commit' | 'operation' | 'remote'

export type StatusTone = 'success' | 'warning' | 'error'

export type Document =
  | { kind: 'text'; text: string }
  | { kind: 'dimmed'; text: string }
  | { kind: 'label'; text: string }
  /** Children rendered inline, one after another. */
  | { kind: 'block'; children: Document[] }
  /** One child per line; empty children are dropped. */
  | { kind: 'lines'; children: Document[] }
  /** Title line followed by the body indented by two spaces. */
  | { kind: 'group'; title: string; count?: number; body: Document }
  | { kind: 'indicator'; change: StatusChange }
  | { kind: 'attribute'; attribute: AttributeKind; text: string }
  | { kind: 'status'; tone: StatusTone; child: Document }
  | { kind: 'empty' }

export const text = (value: string): Document => ({ kind: 'text', text: value })

export const dimmed = (value: string): Document => ({ kind: 'dimmed', text: value })

export const label = (value: string): Document => ({ kind: 'label', text: value })

export const block = (...children: Document[]): Document => ({ kind: 'block', children })

export const lines = (children: Document[]): Document => ({ kind: 'lines', children })

export const group = (title: string, body: Document, count?: number): Document =>
  count === undefined ? { kind: 'group', title, body } : { kind: 'group', title, count, body }

export const indicator = (change: StatusChange): Document => ({ kind: 'indicator', change })

export const attribute = (kind: AttributeKind, value: string): Document => ({
  kind: 'attribute',
  attribute: kind,
  text: value
})

export const status = (tone: StatusTone, child: Document): Document => ({
  kind: 'status',
  tone,
  child
})

export const empty: Document = { kind: 'empty' }
