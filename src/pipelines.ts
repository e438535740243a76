/**
 * Pipeline entry points.
 *
 * Each entry point validates its parameters, assembles the crew and runs it
 * to completion. Validation happens before anything touches an external
 * service; failures of the run itself surface as PipelineError.
 */
import { z } from 'zod';
import type { AgentRecords } from './agents/types';
import { DEFAULT_ARTICLE_COUNT, MAX_ARTICLE_COUNT } from './constants/marketing';
import {
  analyticsCrew,
  dailyContentCrew,
  emailCrew,
  fullCrew,
  seoCrew,
  type Crew,
  type CrewName,
  type CrewRunner,
  type TaskOutput,
  type ToolCallRecord,
} from './crews';
import { PipelineError, errorMessage } from './errors';
import type { Logger } from './logger';

export type PipelineName = 'daily_content' | 'seo_content' | 'email_sequence' | 'analytics_report' | 'full_pipeline';

export interface PipelineResult {
  pipeline: PipelineName;
  crew: CrewName;
  /** Output of the last task */
  output: string;
  tasks: TaskOutput[];
  toolCalls: ToolCallRecord[];
  durationMs: number;
}

const requiredText = (field: string) => z.string().trim().min(1, `${field} is required`);

export const dailyContentParams = z.object({
  niche: requiredText('niche'),
});

export const seoContentParams = z.object({
  topic: requiredText('topic'),
  numArticles: z.number().int().min(1).max(MAX_ARTICLE_COUNT).default(DEFAULT_ARTICLE_COUNT),
});

export const emailSequenceParams = z.object({
  productName: requiredText('productName'),
  valueProposition: z.string().default(''),
});

export const fullPipelineParams = z.object({
  niche: requiredText('niche'),
  productName: requiredText('productName'),
  valueProposition: z.string().default(''),
});

export type DailyContentParams = z.input<typeof dailyContentParams>;
export type SeoContentParams = z.input<typeof seoContentParams>;
export type EmailSequenceParams = z.input<typeof emailSequenceParams>;
export type FullPipelineParams = z.input<typeof fullPipelineParams>;

export interface Pipelines {
  runDailyContent(params: DailyContentParams): Promise<PipelineResult>;
  runSeoContent(params: SeoContentParams): Promise<PipelineResult>;
  runEmailSequence(params: EmailSequenceParams): Promise<PipelineResult>;
  runAnalyticsReport(): Promise<PipelineResult>;
  runFullPipeline(params: FullPipelineParams): Promise<PipelineResult>;
}

export interface PipelineDeps {
  agents: AgentRecords;
  runner: CrewRunner;
  logger: Logger;
}

function parseParams<S extends z.ZodTypeAny>(pipeline: PipelineName, schema: S, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new PipelineError('invalid_params', `Invalid parameters for ${pipeline}: ${details}`);
  }
  return parsed.data;
}

export function createPipelines({ agents, runner, logger }: PipelineDeps): Pipelines {
  const log = logger.child({ component: 'pipeline' });

  async function execute(pipeline: PipelineName, crew: Crew): Promise<PipelineResult> {
    const startedAt = Date.now();
    log.info({ pipeline, crew: crew.name }, 'Pipeline started');
    try {
      const result = await runner.kickoff(crew);
      const durationMs = Date.now() - startedAt;
      log.info({ pipeline, crew: crew.name, durationMs, toolCalls: result.toolCalls.length }, 'Pipeline finished');
      return {
        pipeline,
        crew: result.crew,
        output: result.output,
        tasks: result.tasks,
        toolCalls: result.toolCalls,
        durationMs,
      };
    } catch (error) {
      log.error({ pipeline, crew: crew.name, error: errorMessage(error) }, 'Pipeline failed');
      throw error;
    }
  }

  return {
    async runDailyContent(params) {
      const { niche } = parseParams('daily_content', dailyContentParams, params);
      return execute('daily_content', dailyContentCrew(agents, niche));
    },

    async runSeoContent(params) {
      const { topic, numArticles } = parseParams('seo_content', seoContentParams, params);
      return execute('seo_content', seoCrew(agents, topic, numArticles));
    },

    async runEmailSequence(params) {
      const { productName, valueProposition } = parseParams('email_sequence', emailSequenceParams, params);
      return execute('email_sequence', emailCrew(agents, productName, valueProposition));
    },

    async runAnalyticsReport() {
      return execute('analytics_report', analyticsCrew(agents));
    },

    async runFullPipeline(params) {
      const { niche, productName, valueProposition } = parseParams('full_pipeline', fullPipelineParams, params);
      return execute('full_pipeline', fullCrew(agents, niche, productName, valueProposition));
    },
  };
}
