import { createTestContext, removeTempDir, type TestContext } from '../__tests__/utils';
import { ToolError } from '../errors';

const TAVILY = 'POST https://api.tavily.com/search';
const SERPER = 'POST https://google.serper.dev/search';

describe('Search tools', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await removeTempDir(ctx.dir);
  });

  describe('search_trends', () => {
    it('should query Tavily and map the results', async () => {
      ctx = await createTestContext({
        routes: {
          [TAVILY]: {
            data: {
              results: [
                { title: 'Agents everywhere', content: 'x'.repeat(400), url: 'https://example.com/a' },
                { content: 'untitled' },
              ],
            },
          },
        },
      });

      const hits = await ctx.bindings.search_trends.run({ query: 'ai agents' });

      expect(hits).toEqual([
        { title: 'Agents everywhere', snippet: 'x'.repeat(300), url: 'https://example.com/a' },
        { title: 'N/A', snippet: 'untitled', url: '' },
      ]);
      expect(ctx.calls).toHaveLength(1);
      expect(ctx.calls[0]?.header('Authorization')).toBe('Bearer test-tavily-key');
      expect(ctx.calls[0]?.body).toEqual({
        query: 'ai agents',
        search_depth: 'advanced',
        max_results: 10,
        include_raw_content: false,
      });
    });

    it('should fail without an API key', async () => {
      ctx = await createTestContext({ env: { TAVILY_API_KEY: '' } });

      await expect(ctx.bindings.search_trends.run({ query: 'ai' })).rejects.toThrow('TAVILY_API_KEY is not configured');
      expect(ctx.calls).toHaveLength(0);
    });

    it('should report the status and body of a rejected request', async () => {
      ctx = await createTestContext({
        routes: { [TAVILY]: { status: 401, data: { detail: 'bad key' } } },
      });

      const error = await ctx.bindings.search_trends.run({ query: 'ai' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ToolError);
      if (!(error instanceof ToolError)) return;
      expect(error.tool).toBe('search_trends');
      expect(error.status).toBe(401);
      expect(error.message).toBe('Tavily API error: 401 - {"detail":"bad key"}');
    });
  });

  describe('google_search', () => {
    it('should query Serper and map organic results', async () => {
      ctx = await createTestContext({
        routes: {
          [SERPER]: {
            data: { organic: [{ title: 'Top tools', snippet: 'A list', link: 'https://example.com/tools' }] },
          },
        },
      });

      const hits = await ctx.bindings.google_search.run({ query: 'ai tools' });

      expect(hits).toEqual([{ title: 'Top tools', snippet: 'A list', url: 'https://example.com/tools' }]);
      expect(ctx.calls[0]?.header('X-API-KEY')).toBe('test-serper-key');
      expect(ctx.calls[0]?.body).toEqual({ q: 'ai tools', num: 10 });
    });

    it('should report an unreachable service', async () => {
      ctx = await createTestContext({ routes: { [SERPER]: new Error('connect ECONNREFUSED') } });

      await expect(ctx.bindings.google_search.run({ query: 'ai' })).rejects.toThrow(
        'Serper API unreachable: connect ECONNREFUSED'
      );
    });

    it('should reject a payload of the wrong shape', async () => {
      ctx = await createTestContext({ routes: { [SERPER]: { data: { organic: 'nope' } } } });

      await expect(ctx.bindings.google_search.run({ query: 'ai' })).rejects.toThrow(
        /^Serper returned an unexpected response: /
      );
    });
  });
});
