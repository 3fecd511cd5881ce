/**
 * Document Renderer
 *
 * Turns a Document tree into text. Colour is an explicit option so the same
 * tree renders identically for a terminal and for a pipe or a test.
 */

import type { ColorMode, StatusChange } from '@shared/types'
import type { AttributeKind, Document, StatusTone } from './document'

export type RenderOptions = {
  color: ColorMode
}

const RESET = '\x1b[0m'

const STYLE = {
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m'
} as const

type Style = keyof typeof STYLE

const ATTRIBUTE_STYLE: Record<AttributeKind, Style> = {
  branch: 'green',
  commit: 'yellow',
  operation: 'magenta',
  remote: 'cyan'
}

const TONE_STYLE: Record<StatusTone, Style> = {
  success: 'green',
  warning: 'yellow',
  error: 'red'
}

const INDICATORS: Record<StatusChange, { word: string; style: Style }> = {
  new: { word: 'new file:', style: 'green' },
  modified: { word: 'modified:', style: 'yellow' },
  renamed: { word: 'renamed:', style: 'cyan' },
  deleted: { word: 'deleted:', style: 'red' },
  typechange: { word: 'typechange:', style: 'magenta' },
  unknown: { word: 'ignored:', style: 'dim' }
}

const INDICATOR_WIDTH = 12

export function renderDocument(node: Document, options: RenderOptions): string {
  const paint = (style: Style, value: string) =>
    options.color === 'always' && value !== '' ? `${STYLE[style]}${value}${RESET}` : value

  switch (node.kind) {
    case 'text':
      return node.text
    case 'dimmed':
      return paint('dim', node.text)
    case 'label':
      return paint('bold', node.text)
    case 'block':
      return node.children.map((child) => renderDocument(child, options)).join('')
    case 'lines':
      return node.children
        .filter((child) => child.kind !== 'empty')
        .map((child) => renderDocument(child, options))
        .join('\n')
    case 'group': {
      const count = node.count === undefined ? '' : ` (${node.count})`
      const title = `${paint('bold', node.title)}${count}`
      const body = renderDocument(node.body, options)
      if (body === '') return title
      const indented = body
        .split('\n')
        .map((line) => (line === '' ? line : `  ${line}`))
        .join('\n')
      return `${title}\n${indented}`
    }
    case 'indicator': {
      const { word, style } = INDICATORS[node.change]
      return paint(style, word.padEnd(INDICATOR_WIDTH))
    }
    case 'attribute':
      return paint(ATTRIBUTE_STYLE[node.attribute], node.text)
    case 'status':
      return paint(TONE_STYLE[node.tone], renderDocument(node.child, { color: 'never' }))
    case 'empty':
      return ''
  }
}
