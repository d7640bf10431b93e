/**
 * Revalidation exports
 */

export {
  RevalidationOrchestrator,
  createRevalidationOrchestrator,
  type RevalidationOrchestratorOptions,
  type LoadRequest,
  type LoadOutcome,
  type LoadSource,
  type NotFoundReason,
} from './revalidation-orchestrator.js';
export { NetworkStatistics, type NetworkStatisticsSnapshot } from './network-stats.js';
export { mergeRequestHeaders } from './headers.js';
