export * as HistoryService from './HistoryService'
export * as PushService from './PushService'
export * as ReportService from './ReportService'
