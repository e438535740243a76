/**
 * Web search bindings used for trend and competitor research.
 *
 * Both services require an API key; a missing key is an error rather than a
 * skip, since research output feeds every later task.
 */
import { z } from 'zod';
import { parseResponse, requireKey, toToolError } from './http';
import { defineTool, type ToolContext } from './types';

const TAVILY_URL = 'https://api.tavily.com/search';
export const SERPER_URL = 'https://google.serper.dev/search';

const SNIPPET_LENGTH = 300;

export interface SearchHit {
  title: string;
  snippet: string;
  url: string;
}

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        content: z.string().nullish(),
        url: z.string().nullish(),
      })
    )
    .default([]),
});

export const serperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().nullish(),
        snippet: z.string().nullish(),
        link: z.string().nullish(),
      })
    )
    .default([]),
  relatedSearches: z.array(z.object({ query: z.string().nullish() })).default([]),
  peopleAlsoAsk: z.array(z.object({ question: z.string().nullish() })).default([]),
});

/**
 * Search trending topics via Tavily.
 */
export function createSearchTrendsTool({ config, http, logger }: ToolContext) {
  return defineTool({
    name: 'search_trends',
    description:
      'Search the web for current trends, news and discussions on a topic. Returns up to 10 results with title, snippet and URL.',
    parameters: z.object({
      query: z.string().min(1).describe('What to search for, e.g. "AI marketing trends this week"'),
    }),
    async run({ query }): Promise<SearchHit[]> {
      const apiKey = requireKey('search_trends', config.search.tavilyApiKey, 'TAVILY_API_KEY');

      logger.debug({ tool: 'search_trends', query }, 'Searching trends');
      try {
        const response = await http.post(
          TAVILY_URL,
          {
            query,
            search_depth: 'advanced',
            max_results: 10,
            include_raw_content: false,
          },
          { headers: { Authorization: `Bearer ${apiKey}` } }
        );
        const body = parseResponse('search_trends', 'Tavily', tavilyResponseSchema, response.data);
        return body.results.map((result) => ({
          title: result.title ?? 'N/A',
          snippet: (result.content ?? '').slice(0, SNIPPET_LENGTH),
          url: result.url ?? '',
        }));
      } catch (error) {
        throw toToolError('search_trends', 'Tavily', error);
      }
    },
  });
}

/**
 * Google results via Serper, for competitor and SERP analysis.
 */
export function createGoogleSearchTool({ config, http, logger }: ToolContext) {
  return defineTool({
    name: 'google_search',
    description: 'Run a Google search and return the top 10 organic results (title, snippet, URL).',
    parameters: z.object({
      query: z.string().min(1).describe('Google search query'),
    }),
    async run({ query }): Promise<SearchHit[]> {
      const apiKey = requireKey('google_search', config.search.serperApiKey, 'SERPER_API_KEY');

      logger.debug({ tool: 'google_search', query }, 'Searching Google');
      try {
        const response = await http.post(
          SERPER_URL,
          { q: query, num: 10 },
          { headers: { 'X-API-KEY': apiKey, 'Content-Type': 'application/json' } }
        );
        const body = parseResponse('google_search', 'Serper', serperResponseSchema, response.data);
        return body.organic.map((result) => ({
          title: result.title ?? 'N/A',
          snippet: result.snippet ?? '',
          url: result.link ?? '',
        }));
      } catch (error) {
        throw toToolError('google_search', 'Serper', error);
      }
    },
  });
}
