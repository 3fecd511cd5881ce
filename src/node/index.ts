/**
 * gitscope - read-side analysis of a git repository.
 *
 * Public entry point: stores, analyses, services and the report renderer.
 */

export { openStore, resetStores, IsomorphicGitStore, MemoryObjectStore } from './adapters/store'
export type { ObjectStore } from './adapters/store'
export { SimpleGitTransport } from './adapters/transport'
export type { RemoteRef, RemoteTransport, TransportPushOptions } from './adapters/transport'
export { loadConfiguration } from './core/config'
export { detectOperation, readRebaseState } from './core/repository-state'
export {
  DiffEmitter,
  DivergenceWalker,
  PushGuard,
  SequencerReader,
  StatusClassifier
} from './domain'
export type { DiffResult, RefUpdate, UpstreamDivergence } from './domain'
export { buildHistoryDocument, buildReportDocument, renderDocument } from './report'
export type { Document, HistoryLayout, RenderOptions } from './report'
export { HistoryService, PushService, ReportService } from './services'
export * from './shared/errors'
