/**
 * Prompt builders for the agent network.
 *
 * Prompts are plain functions of the agent record and the run's progress,
 * so they can be tested without a model.
 */

export { buildAgentPrompt, buildKickoffMessage } from './agentPrompt';
