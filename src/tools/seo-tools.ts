/**
 * Keyword research and article persistence for the SEO agent.
 */
import { z } from 'zod';
import { fileStamp, safeFileTitle } from '../artifacts';
import { errorMessage } from '../errors';
import { parseResponse, requireKey, toToolError } from './http';
import { SERPER_URL, serperResponseSchema } from './search-tools';
import { defineTool, type SavedResult, type ToolContext } from './types';

const SUGGEST_URL = 'https://suggestqueries.google.com/complete/search';
const MAX_SUGGESTIONS = 10;

// [query, [suggestion, ...], ...]
const suggestResponseSchema = z.tuple([z.string(), z.array(z.string())]).rest(z.unknown());

export interface KeywordResearch {
  topic: string;
  keywords: string[];
}

/**
 * Long-tail keywords from Google autocomplete plus Serper related searches
 * and "people also ask" questions.
 *
 * Autocomplete is best effort; Serper is required.
 */
export function createKeywordResearchTool({ config, http, logger }: ToolContext) {
  return defineTool({
    name: 'keyword_research',
    description:
      'Find long-tail keywords for a topic using Google autocomplete, related searches and "people also ask" questions.',
    parameters: z.object({
      topic: z.string().min(1).describe('Seed topic, e.g. "AI writing tools"'),
    }),
    async run({ topic }): Promise<KeywordResearch> {
      const apiKey = requireKey('keyword_research', config.search.serperApiKey, 'SERPER_API_KEY');
      const keywords: string[] = [];

      try {
        const response = await http.get(SUGGEST_URL, { params: { client: 'firefox', q: topic } });
        const parsed = suggestResponseSchema.safeParse(response.data);
        if (parsed.success) {
          keywords.push(...parsed.data[1].slice(0, MAX_SUGGESTIONS));
        } else {
          logger.warn({ tool: 'keyword_research', topic }, 'Unexpected autocomplete response, skipping suggestions');
        }
      } catch (error) {
        logger.warn({ tool: 'keyword_research', topic, error: errorMessage(error) }, 'Autocomplete unavailable');
      }

      try {
        const response = await http.post(
          SERPER_URL,
          { q: topic, num: 5 },
          { headers: { 'X-API-KEY': apiKey, 'Content-Type': 'application/json' } }
        );
        const body = parseResponse('keyword_research', 'Serper', serperResponseSchema, response.data);
        for (const item of body.relatedSearches) {
          if (item.query) keywords.push(item.query);
        }
        for (const item of body.peopleAlsoAsk) {
          if (item.question) keywords.push(item.question);
        }
      } catch (error) {
        throw toToolError('keyword_research', 'Serper', error);
      }

      const unique = [...new Set(keywords.filter((keyword) => keyword.length > 0))];
      logger.debug({ tool: 'keyword_research', topic, count: unique.length }, 'Keywords found');
      return { topic, keywords: unique };
    },
  });
}

export function formatArticle(title: string, keywords: string, content: string, createdAt: Date): string {
  const frontMatter = [
    '---',
    `title: ${JSON.stringify(title)}`,
    `keywords: ${JSON.stringify(keywords)}`,
    `date: ${createdAt.toISOString()}`,
    '---',
  ].join('\n');
  return `${frontMatter}\n\n${content}`;
}

export function createSaveArticleTool({ artifacts, logger }: ToolContext) {
  return defineTool({
    name: 'save_seo_article',
    description: 'Save a finished SEO article as markdown with title, keywords and date front matter.',
    parameters: z.object({
      title: z.string().min(1).describe('Article title, used for the file name'),
      content: z.string().min(1).describe('Full article body in markdown'),
      keywords: z.string().describe('Comma-separated target keywords'),
    }),
    async run({ title, content, keywords }): Promise<SavedResult> {
      const createdAt = artifacts.now();
      const artifact = await artifacts.write(
        'articles',
        `${safeFileTitle(title)}-${fileStamp(createdAt)}`,
        '.md',
        formatArticle(title, keywords, content, createdAt),
        createdAt
      );
      logger.info({ tool: 'save_seo_article', path: artifact.path }, 'Article saved');
      return { status: 'saved', path: artifact.path };
    },
  });
}
