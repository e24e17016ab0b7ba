/**
 * report-provider module — build reference → report lookup
 */

export type { ReportProvider } from './report-provider.js'
export { InMemoryReportProvider } from './in-memory-provider.js'
