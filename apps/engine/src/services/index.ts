export { Orchestrator } from './orchestrator';
export type { OrchestratorConfig, OrchestratorDeps, RetryPolicy, RunOptions, RemoveOptions, TickReport } from './orchestrator';
export { LeaderElector } from './leaderelector';
export type { Lease } from './leaderelector';
export { advance, assertInvariants, assertTransition, canTransition, isTerminal } from './state-machine';
