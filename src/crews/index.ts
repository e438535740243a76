/**
 * Crew definitions and sequencing.
 *
 * The AgentKit runner is imported from './agentkit-runner' directly by the
 * runtime so that this module stays free of the framework.
 */

export * from './types';
export * from './tasks';
export { analyticsCrew, dailyContentCrew, defineCrew, emailCrew, fullCrew, seoCrew } from './crews';
export { CrewRun, type AgentTurn } from './sequencer';
