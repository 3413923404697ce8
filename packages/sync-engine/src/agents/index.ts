/**
 * Sync Engine Agents
 * Export all agent implementations
 */

export {
  ReconcileAgent,
  createReconcileAgent,
  SCRAPE_COMPLETED_QUEUE,
  type ReconcileAgentDependencies,
} from './reconcile-agent.js';

export {
  SweepAgent,
  createSweepAgent,
  SWEEP_QUEUE,
  type SweepAgentDependencies,
} from './sweep-agent.js';
