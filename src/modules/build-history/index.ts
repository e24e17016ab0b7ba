/**
 * build-history module — persistent build/report history
 */

export { BuildHistoryStore } from './build-history-store.js'
export type { BuildSummary } from './build-history-store.js'
