import type { LlmProfileName } from '../config';
import type { ToolName } from '../tools/types';

export type AgentKind = 'content' | 'social' | 'seo' | 'email' | 'analytics';

export const AGENT_KINDS: readonly AgentKind[] = ['content', 'social', 'seo', 'email', 'analytics'];

/**
 * Framework-independent description of one marketing agent.
 *
 * Records are built once per process and never mutated; the crew runner
 * turns them into framework agents for each run.
 */
export interface AgentRecord {
  readonly kind: AgentKind;
  /** Network-unique agent name */
  readonly name: string;
  readonly role: string;
  readonly goal: string;
  readonly backstory: string;
  readonly toolNames: readonly ToolName[];
  readonly llm: LlmProfileName;
  /** Iteration budget for one task */
  readonly maxIter: number;
}

export type AgentRecords = Readonly<Record<AgentKind, AgentRecord>>;

/**
 * Options shared by every agent factory.
 */
export interface AgentOptions {
  maxIter: number;
}
