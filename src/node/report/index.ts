export { buildHistoryDocument } from './build-history-document'
export type { HistoryLayout } from './build-history-document'
export { buildReportDocument } from './build-report-document'
export * from './document'
export { renderDocument } from './render'
export type { RenderOptions } from './render'
