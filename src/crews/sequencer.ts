/**
 * Sequential task bookkeeping for one crew run.
 *
 * The sequencer is independent of the orchestration framework: the runner
 * reports what happened (tool calls, completed tasks, agent turns) and asks
 * which agent should run next. State lives here rather than in the
 * framework's network state so that the same closure is shared by system
 * prompts, tool handlers and the router.
 *
 * A task is complete when its agent calls complete_task, or when the agent
 * ends a turn with text and no tool calls (its final answer). A recorded
 * tool failure stops the run.
 */
import type { AgentKind } from '../agents/types';
import { PipelineError, type ToolError } from '../errors';
import type { Crew, CrewResult, TaskOutput, TaskRecord, ToolCallRecord } from './types';

/**
 * What the last agent turn produced, as seen by the router.
 */
export interface AgentTurn {
  agent: AgentKind;
  text: string;
  calledTools: boolean;
}

export class CrewRun {
  readonly crew: Crew;

  private index = 0;
  private pendingOutput: string | undefined;
  private failure: ToolError | undefined;
  private readonly outputs: TaskOutput[] = [];
  private readonly calls: ToolCallRecord[] = [];

  constructor(crew: Crew) {
    this.crew = crew;
  }

  currentTask(): TaskRecord | undefined {
    if (this.failure) return undefined;
    return this.crew.tasks[this.index];
  }

  get failed(): boolean {
    return this.failure !== undefined;
  }

  get completedCount(): number {
    return this.outputs.length;
  }

  /**
   * Outputs handed to a task: its declared context, or every earlier task.
   */
  contextFor(task: TaskRecord): TaskOutput[] {
    const position = this.crew.tasks.findIndex((candidate) => candidate.id === task.id);
    const ids = task.context ?? this.crew.tasks.slice(0, Math.max(position, 0)).map((earlier) => earlier.id);
    return this.outputs.filter((output) => ids.includes(output.taskId));
  }

  /**
   * Record the final output of the current task. The task is closed on the
   * next call to advance().
   */
  completeCurrent(output: string): void {
    if (!this.currentTask()) {
      throw new Error(`Crew "${this.crew.name}" has no task in progress`);
    }
    this.pendingOutput = output;
  }

  recordToolCall(tool: ToolCallRecord['tool'], agent: AgentKind): void {
    const task = this.crew.tasks[this.index];
    this.calls.push({ taskId: task ? task.id : 'none', agent, tool });
  }

  fail(error: ToolError): void {
    if (!this.failure) this.failure = error;
  }

  /**
   * Close the current task if it is complete and return the agent that
   * should run next, or undefined when the run is over.
   */
  advance(turn?: AgentTurn): AgentKind | undefined {
    const task = this.currentTask();
    if (!task) return undefined;

    if (this.pendingOutput !== undefined) {
      this.close(task, this.pendingOutput);
    } else if (turn && turn.agent === task.agent && !turn.calledTools && turn.text.trim().length > 0) {
      this.close(task, turn.text.trim());
    }

    return this.currentTask()?.agent;
  }

  /**
   * @throws PipelineError when a tool failed or a task never completed
   */
  finish(): CrewResult {
    if (this.failure) {
      throw new PipelineError('tool_failed', `Tool ${this.failure.tool} failed: ${this.failure.message}`, {
        cause: this.failure,
      });
    }

    const remaining = this.crew.tasks[this.index];
    if (remaining) {
      throw new PipelineError(
        'incomplete',
        `Crew "${this.crew.name}" stopped before task "${remaining.id}" completed ` +
          `(${this.outputs.length} of ${this.crew.tasks.length} tasks done)`
      );
    }

    const last = this.outputs[this.outputs.length - 1];
    return {
      crew: this.crew.name,
      output: last ? last.output : '',
      tasks: [...this.outputs],
      toolCalls: [...this.calls],
    };
  }

  private close(task: TaskRecord, output: string): void {
    this.outputs.push({ taskId: task.id, agent: task.agent, output });
    this.pendingOutput = undefined;
    this.index++;
  }
}
