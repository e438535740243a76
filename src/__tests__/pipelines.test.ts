/**
 * Pipeline entry points, run end to end with scripted agents: real crews,
 * real bindings against stubbed HTTP, real artifacts on disk.
 */
import * as path from 'node:path';
import { createAgentRecords, type AgentKind } from '../agents';
import { PipelineError } from '../errors';
import { logger } from '../logger';
import { createPipelines, type Pipelines } from '../pipelines';
import {
  ScriptedCrewRunner,
  createTestContext,
  readArtifact,
  removeTempDir,
  type AgentScript,
  type StubRoute,
  type TestContext,
} from './utils';

describe('Pipelines', () => {
  let ctx: TestContext;
  let runner: ScriptedCrewRunner;
  let pipelines: Pipelines;

  async function setUp(
    scripts: Partial<Record<AgentKind, AgentScript>> = {},
    routes: Record<string, StubRoute> = {}
  ): Promise<void> {
    ctx = await createTestContext({ routes });
    runner = new ScriptedCrewRunner(ctx.bindings, scripts);
    pipelines = createPipelines({ agents: createAgentRecords(ctx.config), runner, logger });
  }

  afterEach(async () => {
    await removeTempDir(ctx.dir);
  });

  describe('parameter validation', () => {
    beforeEach(async () => {
      await setUp();
    });

    it('should reject an empty niche before running anything', async () => {
      await expect(pipelines.runDailyContent({ niche: '   ' })).rejects.toThrow(
        new PipelineError('invalid_params', 'Invalid parameters for daily_content: niche: niche is required')
      );
      expect(runner.kickoffs).toHaveLength(0);
    });

    it('should reject an out-of-range article count', async () => {
      const error = await pipelines.runSeoContent({ topic: 'AI tools', numArticles: 0 }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(PipelineError);
      if (!(error instanceof PipelineError)) return;
      expect(error.kind).toBe('invalid_params');
      expect(error.message).toMatch(/^Invalid parameters for seo_content: numArticles: /);
    });

    it('should require a product name for the email sequence', async () => {
      await expect(pipelines.runEmailSequence({ productName: '' })).rejects.toThrow(
        'Invalid parameters for email_sequence: productName: productName is required'
      );
    });

    it('should default the article count and value proposition', async () => {
      await pipelines.runSeoContent({ topic: 'AI tools' });
      await pipelines.runEmailSequence({ productName: 'MarketBot' });

      expect(runner.kickoffs[0]?.tasks[0]?.description).toContain('Create 3 SEO-optimized articles');
      expect(runner.kickoffs[1]?.tasks[0]?.description).toContain('Value proposition: \n');
    });
  });

  it('should select the crew of each entry point', async () => {
    await setUp();

    await pipelines.runDailyContent({ niche: 'AI tools' });
    await pipelines.runSeoContent({ topic: 'AI tools', numArticles: 2 });
    await pipelines.runEmailSequence({ productName: 'MarketBot' });
    await pipelines.runAnalyticsReport();
    await pipelines.runFullPipeline({ niche: 'AI tools', productName: 'MarketBot' });

    expect(
      runner.kickoffs.map((crew) => ({ name: crew.name, agents: crew.tasks.map((task) => task.agent) }))
    ).toEqual([
      { name: 'daily-content', agents: ['content', 'social'] },
      { name: 'seo', agents: ['seo'] },
      { name: 'email', agents: ['email'] },
      { name: 'analytics', agents: ['analytics'] },
      { name: 'full', agents: ['content', 'social', 'seo', 'email', 'analytics'] },
    ]);
  });

  it('should save an email draft naming the product', async () => {
    await setUp({
      email: async (task, { useTool }) => {
        await useTool('save_email_draft', {
          subject: 'Welcome to MarketBot',
          content: 'MarketBot puts your marketing on autopilot.',
          sequence_position: 1,
        });
        return `Saved 1 draft for: ${task.id}`;
      },
    });

    const result = await pipelines.runEmailSequence({ productName: 'MarketBot', valueProposition: 'Autopilot' });

    expect(result.pipeline).toBe('email_sequence');
    expect(result.crew).toBe('email');
    expect(result.output).toBe('Saved 1 draft for: email');
    expect(result.toolCalls).toEqual([{ taskId: 'email', agent: 'email', tool: 'save_email_draft' }]);

    const files = await ctx.artifacts.list('emails');
    expect(files).toEqual(['seq01-20261019-090507.md']);
    const draft = await readArtifact(path.join(ctx.artifacts.dir('emails'), 'seq01-20261019-090507.md'));
    expect(draft).toContain('MarketBot');
  });

  it('should hand the content output to the social task', async () => {
    let seen: string[] = [];
    await setUp({
      content: async () => 'Three tweets and a LinkedIn post',
      social: async (_task, { context }) => {
        seen = context.map((item) => item.output);
        return 'Scheduled 4 posts';
      },
    });

    const result = await pipelines.runDailyContent({ niche: 'AI tools' });

    expect(seen).toEqual(['Three tweets and a LinkedIn post']);
    expect(result.output).toBe('Scheduled 4 posts');
    expect(result.tasks.map((task) => task.taskId)).toEqual(['content', 'social']);
  });

  it('should fail the run and save nothing when a tool fails', async () => {
    await setUp(
      {
        content: async (_task, { useTool }) => {
          await useTool('search_trends', { query: 'AI tools' });
          await useTool('save_post_locally', { content: 'never written', platform: 'twitter' });
          return 'unreachable';
        },
      },
      { 'POST https://api.tavily.com/search': { status: 503, data: 'upstream down' } }
    );

    const error = await pipelines.runDailyContent({ niche: 'AI tools' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PipelineError);
    if (!(error instanceof PipelineError)) return;
    expect(error.kind).toBe('tool_failed');
    expect(error.message).toBe('Tool search_trends failed: Tavily API error: 503 - upstream down');
    expect(await ctx.artifacts.list('posts')).toEqual([]);
  });

  it('should run all five tasks in the full pipeline', async () => {
    await setUp();

    const result = await pipelines.runFullPipeline({ niche: 'AI tools', productName: 'MarketBot' });

    expect(result.pipeline).toBe('full_pipeline');
    expect(result.tasks.map((task) => task.agent)).toEqual(['content', 'social', 'seo', 'email', 'analytics']);
    expect(result.output).toBe('analytics done');
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should run the analytics report against local data', async () => {
    await setUp({
      analytics: async (_task, { useTool }) => {
        const reading = await useTool('read_analytics', { source: 'all' });
        await useTool('save_daily_report', { report: JSON.stringify(reading) });
        await useTool('send_telegram', { message: 'Report saved' });
        return 'Report saved, Telegram skipped';
      },
    });

    const result = await pipelines.runAnalyticsReport();

    expect(result.output).toBe('Report saved, Telegram skipped');
    expect(await ctx.artifacts.list('reports')).toEqual(['daily-2026-10-19.md']);
    expect(result.toolCalls.map((call) => call.tool)).toEqual(['read_analytics', 'save_daily_report', 'send_telegram']);
  });
});
