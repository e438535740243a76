/**
 * Crew runner backed by AgentKit.
 *
 * Each kickoff builds a fresh network: one AgentKit agent per crew member,
 * with its bindings adapted into AgentKit tools plus a complete_task tool.
 * A code router asks the sequencer which agent owns the current task, so
 * tasks execute strictly in order and the network stops after the last one
 * (or as soon as a tool fails).
 *
 * ## Factory Pattern
 *
 * ```typescript
 * const runner = new AgentKitCrewRunner({ config, bindings, logger });
 * const result = await runner.kickoff(dailyContentCrew(agents, 'AI tools'));
 * ```
 *
 * ## Run State
 *
 * Task progress lives in a CrewRun shared by the system prompts, the tool
 * handlers and the router of one kickoff; AgentKit's network state only
 * carries the message history.
 */
import { anthropic, createAgent, createNetwork, createTool, openai, type AgentResult } from '@inngest/agent-kit';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import { z } from 'zod';
import type { AgentKind, AgentRecord } from '../agents/types';
import type { Config, LlmProfileName } from '../config';
import { PipelineError, ToolError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { buildAgentPrompt, buildKickoffMessage } from '../prompts';
import type { ToolBindings } from '../tools/types';
import { CrewRun, type AgentTurn } from './sequencer';
import type { Crew, CrewResult, CrewRunner } from './types';

const tracer = trace.getTracer('marketing-crew');

export interface AgentKitCrewRunnerOptions {
  config: Config;
  bindings: ToolBindings;
  logger: Logger;
}

/**
 * Build the model adapter for a sampling profile.
 * DeepSeek is served through its OpenAI-compatible API.
 */
export function createModel(config: Config, profile: LlmProfileName) {
  const { provider, model, apiKey, baseUrl, maxTokens } = config.llm;
  const { temperature } = config.llm.profiles[profile];

  if (provider === 'anthropic') {
    return anthropic({
      model,
      apiKey,
      baseUrl,
      defaultParameters: { max_tokens: maxTokens, temperature },
    });
  }

  return openai({
    model,
    apiKey,
    baseUrl,
    defaultParameters: { max_completion_tokens: maxTokens, temperature },
  });
}

function textOf(content: string | { text: string }[]): string {
  return typeof content === 'string' ? content : content.map((part) => part.text).join('');
}

/**
 * Reduce an AgentKit result to what the sequencer needs.
 */
function summarizeTurn(result: AgentResult, kinds: ReadonlyMap<string, AgentKind>): AgentTurn | undefined {
  const agent = kinds.get(result.agentName);
  if (!agent) return undefined;

  const text = result.output
    .map((message) => (message.type === 'text' ? textOf(message.content) : ''))
    .filter((part) => part.length > 0)
    .join('\n');

  return { agent, text, calledTools: result.toolCalls.length > 0 };
}

export class AgentKitCrewRunner implements CrewRunner {
  private readonly config: Config;
  private readonly bindings: ToolBindings;
  private readonly logger: Logger;

  constructor({ config, bindings, logger }: AgentKitCrewRunnerOptions) {
    this.config = config;
    this.bindings = bindings;
    this.logger = logger.child({ component: 'crew' });
  }

  async kickoff(crew: Crew): Promise<CrewResult> {
    return tracer.startActiveSpan(
      'crew.kickoff',
      { attributes: { 'crew.name': crew.name, 'crew.task_count': crew.tasks.length } },
      async (span) => {
        try {
          const result = await this.execute(crew);
          span.setAttributes({ 'crew.tool_calls': result.toolCalls.length });
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
          if (error instanceof Error) span.recordException(error);
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  private async execute(crew: Crew): Promise<CrewResult> {
    const run = new CrewRun(crew);
    const agents = new Map(crew.agents.map((record) => [record.kind, this.buildAgent(record, run)] as const));
    const kinds = new Map(crew.agents.map((record) => [record.name, record.kind] as const));
    const maxIter = crew.tasks.reduce((total, task) => {
      const record = crew.agents.find((candidate) => candidate.kind === task.agent);
      return total + (record ? record.maxIter : this.config.agents.maxIterPerTask);
    }, 0);

    const network = createNetwork({
      name: `${crew.name}-crew`,
      agents: [...agents.values()],
      defaultModel: createModel(this.config, 'creative'),
      maxIter,
      router: ({ lastResult }) => {
        const turn = lastResult ? summarizeTurn(lastResult, kinds) : undefined;
        const next = run.advance(turn);
        if (!next) {
          this.logger.debug({ crew: crew.name, completed: run.completedCount }, 'Router stopping network');
          return undefined;
        }
        this.logger.debug({ crew: crew.name, agent: next, task: run.currentTask()?.id }, 'Routing to agent');
        return agents.get(next);
      },
    });

    this.logger.info({ crew: crew.name, tasks: crew.tasks.map((task) => task.id), maxIter }, 'Crew kickoff');

    try {
      await network.run(buildKickoffMessage(crew));
    } catch (error) {
      if (!run.failed) {
        throw new PipelineError('crew_failed', `Crew "${crew.name}" failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    // complete_task may land on the last allowed iteration, after the final routing call
    run.advance();
    const result = run.finish();
    this.logger.info({ crew: crew.name, toolCalls: result.toolCalls.length }, 'Crew completed');
    return result;
  }

  private buildAgent(record: AgentRecord, run: CrewRun) {
    const tools = record.toolNames.map((name) => {
      const binding = this.bindings[name];
      return createTool({
        name: binding.name,
        description: binding.description,
        parameters: binding.parameters,
        handler: async (input) => {
          // One inference may request several tools; none runs after a failure
          if (run.failed) {
            throw new ToolError(binding.name, 'Crew aborted after an earlier tool failure');
          }
          run.recordToolCall(binding.name, record.kind);
          this.logger.debug({ agent: record.kind, tool: binding.name }, 'Tool call');
          const parsed = binding.parameters.safeParse(input);
          if (!parsed.success) {
            // Malformed arguments go back to the model, which may retry
            this.logger.warn({ agent: record.kind, tool: binding.name }, 'Invalid tool arguments');
            return { status: 'invalid', error: parsed.error.issues.map((issue) => issue.message).join('; ') };
          }
          try {
            return await binding.run(parsed.data);
          } catch (error) {
            const failure =
              error instanceof ToolError
                ? error
                : new ToolError(binding.name, errorMessage(error), undefined, { cause: error });
            this.logger.error({ agent: record.kind, tool: binding.name, error: failure.message }, 'Tool failed');
            run.fail(failure);
            throw failure;
          }
        },
      });
    });

    const completeTask = createTool({
      name: 'complete_task',
      description:
        'Signal that your current task is complete. Pass the final deliverable; it is handed to the next task.',
      parameters: z.object({
        output: z.string().min(1).describe('Final result of the task, following its expected output'),
      }),
      handler: async ({ output }) => {
        if (run.failed) {
          throw new ToolError('complete_task', 'Crew aborted after an earlier tool failure');
        }
        const task = run.currentTask();
        if (!task || task.agent !== record.kind) {
          return { complete: false, message: 'You have no task in progress' };
        }
        run.recordToolCall('complete_task', record.kind);
        run.completeCurrent(output);
        return { complete: true, task: task.id };
      },
    });

    return createAgent({
      name: record.name,
      description: record.role,
      model: createModel(this.config, record.llm),
      tools: [...tools, completeTask],
      system: () => {
        const task = run.currentTask();
        return buildAgentPrompt(record, task, task ? run.contextFor(task) : []);
      },
    });
  }
}
