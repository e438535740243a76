import type { AgentKind, AgentRecord } from '../agents/types';
import type { ToolName } from '../tools/types';

export type CrewName = 'daily-content' | 'seo' | 'email' | 'analytics' | 'full';

/**
 * One unit of work assigned to one agent.
 */
export interface TaskRecord {
  /** Unique within the crew */
  readonly id: string;
  readonly description: string;
  readonly expectedOutput: string;
  readonly agent: AgentKind;
  /**
   * Ids of earlier tasks whose output is handed to this one.
   * Defaults to every earlier task.
   */
  readonly context?: readonly string[];
}

/**
 * A validated composition of agents and tasks, executed sequentially.
 */
export interface Crew {
  readonly name: CrewName;
  readonly agents: readonly AgentRecord[];
  readonly tasks: readonly TaskRecord[];
}

export interface TaskOutput {
  taskId: string;
  agent: AgentKind;
  output: string;
}

export interface ToolCallRecord {
  taskId: string;
  agent: AgentKind;
  tool: ToolName | 'complete_task';
}

export interface CrewResult {
  crew: CrewName;
  /** Output of the last task */
  output: string;
  tasks: TaskOutput[];
  toolCalls: ToolCallRecord[];
}

/**
 * Executes a crew to completion.
 *
 * Implementations throw PipelineError when a tool fails, when the iteration
 * budget runs out, or when the underlying framework throws.
 */
export interface CrewRunner {
  kickoff(crew: Crew): Promise<CrewResult>;
}
