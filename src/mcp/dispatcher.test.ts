import { createFakePipelines } from '../__tests__/utils';
import { PipelineError } from '../errors';
import { logger } from '../logger';
import { McpDispatcher } from './dispatcher';
import { ERROR_CODES } from './protocol';

describe('McpDispatcher', () => {
  function setUp(output?: string) {
    const fake = createFakePipelines(output);
    const dispatcher = new McpDispatcher({ pipelines: fake.pipelines, logger });
    return { ...fake, dispatcher };
  }

  it('should answer initialize with the server info', async () => {
    const { dispatcher } = setUp();

    await expect(
      dispatcher.handle({ jsonrpc: '2.0', id: 1, method: 'initialize', params: { protocolVersion: '2025-03-26' } })
    ).resolves.toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2025-03-26',
        capabilities: { tools: {} },
        serverInfo: { name: 'marketing-crew', version: '1.0.0' },
      },
    });
  });

  it('should fall back to the default protocol version', async () => {
    const { dispatcher } = setUp();

    const response = await dispatcher.handle({ jsonrpc: '2.0', id: 'a', method: 'initialize' });

    expect(response).toMatchObject({ result: { protocolVersion: '2024-11-05' } });
  });

  it('should ignore notifications', async () => {
    const { dispatcher } = setUp();

    await expect(dispatcher.handle({ jsonrpc: '2.0', method: 'notifications/initialized' })).resolves.toBeUndefined();
  });

  it('should list the five pipeline tools', async () => {
    const { dispatcher } = setUp();

    const response = await dispatcher.handle({ jsonrpc: '2.0', id: 2, method: 'tools/list' });

    expect(response).toMatchObject({ id: 2 });
    if (!response || !('result' in response)) throw new Error('expected a result');
    expect(response.result).toMatchObject({
      tools: [
        { name: 'daily_content', inputSchema: { required: ['niche'] } },
        { name: 'seo_content', inputSchema: { required: ['topic'] } },
        { name: 'email_sequence', inputSchema: { required: ['product_name'] } },
        { name: 'analytics_report', inputSchema: { properties: {} } },
        { name: 'full_pipeline', inputSchema: { required: ['niche', 'product_name'] } },
      ],
    });
  });

  it('should run a pipeline and return its output as text', async () => {
    const { dispatcher, calls } = setUp('7 drafts saved');

    const response = await dispatcher.handle({
      jsonrpc: '2.0',
      id: 3,
      method: 'tools/call',
      params: { name: 'email_sequence', arguments: { product_name: 'MarketBot' } },
    });

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { content: [{ type: 'text', text: '# Email Sequence Created\n\n7 drafts saved' }] },
    });
    expect(calls).toEqual([{ pipeline: 'email_sequence', params: { productName: 'MarketBot', valueProposition: '' } }]);
  });

  it('should map snake_case arguments and apply defaults', async () => {
    const { dispatcher, calls } = setUp();

    await dispatcher.handle({ jsonrpc: '2.0', id: 4, method: 'tools/call', params: { name: 'seo_content', arguments: {} } });
    await dispatcher.handle({ jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'daily_content' } });

    expect(calls).toEqual([
      { pipeline: 'seo_content', params: { topic: 'AI tools', numArticles: 3 } },
      { pipeline: 'daily_content', params: { niche: 'AI and technology' } },
    ]);
  });

  it('should return pipeline failures as error results', async () => {
    const { dispatcher, state } = setUp();
    state.failWith = new PipelineError('tool_failed', 'Tool search_trends failed: Tavily API error: 500');

    const response = await dispatcher.handle({
      jsonrpc: '2.0',
      id: 6,
      method: 'tools/call',
      params: { name: 'daily_content', arguments: { niche: 'AI' } },
    });

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 6,
      result: {
        content: [{ type: 'text', text: 'Error: Tool search_trends failed: Tavily API error: 500' }],
        isError: true,
      },
    });
  });

  it('should return invalid arguments as error results', async () => {
    const { dispatcher, calls } = setUp();

    const response = await dispatcher.handle({
      jsonrpc: '2.0',
      id: 7,
      method: 'tools/call',
      params: { name: 'full_pipeline', arguments: { niche: 'AI' } },
    });

    expect(response).toMatchObject({ result: { isError: true } });
    expect(calls).toHaveLength(0);
  });

  it('should reject an unknown tool', async () => {
    const { dispatcher } = setUp();

    await expect(
      dispatcher.handle({ jsonrpc: '2.0', id: 8, method: 'tools/call', params: { name: 'launch_rocket' } })
    ).resolves.toEqual({
      jsonrpc: '2.0',
      id: 8,
      error: { code: ERROR_CODES.INVALID_PARAMS, message: 'Unknown tool: launch_rocket' },
    });
  });

  it('should reject a call without a tool name', async () => {
    const { dispatcher } = setUp();

    await expect(dispatcher.handle({ jsonrpc: '2.0', id: 9, method: 'tools/call' })).resolves.toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32602, message: 'tools/call requires a tool name' },
    });
  });

  it('should reject an unknown method', async () => {
    const { dispatcher } = setUp();

    await expect(dispatcher.handle({ jsonrpc: '2.0', id: 10, method: 'resources/list' })).resolves.toEqual({
      jsonrpc: '2.0',
      id: 10,
      error: { code: -32601, message: 'Method not found: resources/list' },
    });
  });

  it('should answer ping', async () => {
    const { dispatcher } = setUp();

    await expect(dispatcher.handle({ jsonrpc: '2.0', id: 11, method: 'ping' })).resolves.toEqual({
      jsonrpc: '2.0',
      id: 11,
      result: {},
    });
  });
});
