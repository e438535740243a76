/**
 * Remote tools: one per pipeline entry point.
 *
 * Argument names use snake_case on the wire and are mapped onto the
 * pipeline parameters here.
 */
import { z } from 'zod';
import { DEFAULT_ARTICLE_COUNT, DEFAULT_NICHE, DEFAULT_SEO_TOPIC } from '../constants/marketing';
import { PipelineError } from '../errors';
import type { PipelineResult, Pipelines } from '../pipelines';

export type RemoteToolName = 'daily_content' | 'seo_content' | 'email_sequence' | 'analytics_report' | 'full_pipeline';

interface JsonSchemaProperty {
  type: 'string' | 'number';
  description: string;
  default?: string | number;
}

export interface RemoteToolDefinition {
  name: RemoteToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
  };
}

interface RemoteTool {
  definition: RemoteToolDefinition;
  /** First line of a successful result */
  heading: string;
  run(pipelines: Pipelines, args: Record<string, unknown>): Promise<PipelineResult>;
}

const dailyContentArgs = z.object({
  niche: z.string().default(DEFAULT_NICHE),
});

const seoContentArgs = z.object({
  topic: z.string().default(DEFAULT_SEO_TOPIC),
  num_articles: z.number().default(DEFAULT_ARTICLE_COUNT),
});

const emailSequenceArgs = z.object({
  product_name: z.string(),
  value_proposition: z.string().default(''),
});

const fullPipelineArgs = z.object({
  niche: z.string(),
  product_name: z.string(),
  value_proposition: z.string().default(''),
});

function parseArgs<S extends z.ZodTypeAny>(tool: RemoteToolName, schema: S, args: Record<string, unknown>): z.output<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
    throw new PipelineError('invalid_params', `Invalid arguments for ${tool}: ${details.join('; ')}`);
  }
  return parsed.data;
}

const REMOTE_TOOLS: Record<RemoteToolName, RemoteTool> = {
  daily_content: {
    definition: {
      name: 'daily_content',
      description:
        'Run daily content creation + social media scheduling pipeline. Researches trends, creates platform-specific posts, and schedules them.',
      inputSchema: {
        type: 'object',
        properties: {
          niche: { type: 'string', description: "Target niche/industry (e.g., 'AI tools', 'fitness apps')" },
        },
        required: ['niche'],
      },
    },
    heading: 'Daily Content Pipeline Complete',
    run: (pipelines, args) => {
      const { niche } = parseArgs('daily_content', dailyContentArgs, args);
      return pipelines.runDailyContent({ niche });
    },
  },

  seo_content: {
    definition: {
      name: 'seo_content',
      description:
        'Run SEO keyword research + article generation pipeline. Finds long-tail keywords and creates SEO-optimized articles.',
      inputSchema: {
        type: 'object',
        properties: {
          topic: { type: 'string', description: 'Topic to create SEO content for' },
          num_articles: {
            type: 'number',
            description: `Number of articles to generate (default: ${DEFAULT_ARTICLE_COUNT})`,
            default: DEFAULT_ARTICLE_COUNT,
          },
        },
        required: ['topic'],
      },
    },
    heading: 'SEO Content Pipeline Complete',
    run: (pipelines, args) => {
      const { topic, num_articles } = parseArgs('seo_content', seoContentArgs, args);
      return pipelines.runSeoContent({ topic, numArticles: num_articles });
    },
  },

  email_sequence: {
    definition: {
      name: 'email_sequence',
      description:
        'Generate a 7-email nurture sequence for a product. Creates welcome, value, and conversion emails.',
      inputSchema: {
        type: 'object',
        properties: {
          product_name: { type: 'string', description: 'Name of the product/service' },
          value_proposition: { type: 'string', description: 'What makes this product valuable' },
        },
        required: ['product_name'],
      },
    },
    heading: 'Email Sequence Created',
    run: (pipelines, args) => {
      const { product_name, value_proposition } = parseArgs('email_sequence', emailSequenceArgs, args);
      return pipelines.runEmailSequence({ productName: product_name, valueProposition: value_proposition });
    },
  },

  analytics_report: {
    definition: {
      name: 'analytics_report',
      description: 'Run daily analytics review. Analyzes all channels and sends summary via Telegram.',
      inputSchema: { type: 'object', properties: {} },
    },
    heading: 'Analytics Report',
    run: (pipelines) => pipelines.runAnalyticsReport(),
  },

  full_pipeline: {
    definition: {
      name: 'full_pipeline',
      description:
        'Run the FULL marketing pipeline - all 5 agents: content creation, social media scheduling, SEO, email sequences, and analytics.',
      inputSchema: {
        type: 'object',
        properties: {
          niche: { type: 'string', description: 'Target niche' },
          product_name: { type: 'string', description: 'Product name' },
          value_proposition: { type: 'string', description: 'Value prop' },
        },
        required: ['niche', 'product_name'],
      },
    },
    heading: 'Full Marketing Pipeline Complete',
    run: (pipelines, args) => {
      const { niche, product_name, value_proposition } = parseArgs('full_pipeline', fullPipelineArgs, args);
      return pipelines.runFullPipeline({ niche, productName: product_name, valueProposition: value_proposition });
    },
  },
};

export const REMOTE_TOOL_NAMES: readonly RemoteToolName[] = [
  'daily_content',
  'seo_content',
  'email_sequence',
  'analytics_report',
  'full_pipeline',
];

export function isRemoteToolName(name: string): name is RemoteToolName {
  return REMOTE_TOOL_NAMES.some((candidate) => candidate === name);
}

export function listRemoteTools(): RemoteToolDefinition[] {
  return REMOTE_TOOL_NAMES.map((name) => REMOTE_TOOLS[name].definition);
}

export function getRemoteTool(name: RemoteToolName): RemoteTool {
  return REMOTE_TOOLS[name];
}
