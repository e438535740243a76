/**
 * Tool bindings for the marketing agents.
 *
 * ## Tool Categories
 *
 * - **Research**: search_trends, google_search, keyword_research
 * - **Publishing**: post_to_buffer, send_email_campaign, send_telegram
 * - **Artifacts**: save_post_locally, save_seo_article, save_email_draft, save_daily_report
 * - **Analytics**: read_analytics
 *
 * Publishing bindings return a skipped status when their credentials are
 * missing; research bindings fail instead.
 */
import { createReadAnalyticsTool, createSaveDailyReportTool } from './analytics-tools';
import { createSaveEmailDraftTool, createSendCampaignTool } from './email-tools';
import { createSendTelegramTool } from './notification-tools';
import { createGoogleSearchTool, createSearchTrendsTool } from './search-tools';
import { createKeywordResearchTool, createSaveArticleTool } from './seo-tools';
import { createPostToBufferTool, createSavePostTool } from './social-tools';
import type { ToolBindings, ToolContext, ToolName } from './types';

export * from './types';
export { createHttpClient, toToolError } from './http';
export { ANALYTICS_REPORT_FILE, ANALYTICS_SOURCES, type AnalyticsReading, type AnalyticsSource } from './analytics-tools';
export { SOCIAL_PLATFORMS, type SocialPlatform } from './social-tools';
export type { SearchHit } from './search-tools';
export type { KeywordResearch } from './seo-tools';

export const TOOL_NAMES: readonly ToolName[] = [
  'search_trends',
  'google_search',
  'post_to_buffer',
  'save_post_locally',
  'keyword_research',
  'save_seo_article',
  'send_email_campaign',
  'save_email_draft',
  'send_telegram',
  'read_analytics',
  'save_daily_report',
];

/**
 * Create every binding against a single context.
 */
export function createToolBindings(context: ToolContext): ToolBindings {
  return {
    search_trends: createSearchTrendsTool(context),
    google_search: createGoogleSearchTool(context),
    post_to_buffer: createPostToBufferTool(context),
    save_post_locally: createSavePostTool(context),
    keyword_research: createKeywordResearchTool(context),
    save_seo_article: createSaveArticleTool(context),
    send_email_campaign: createSendCampaignTool(context),
    save_email_draft: createSaveEmailDraftTool(context),
    send_telegram: createSendTelegramTool(context),
    read_analytics: createReadAnalyticsTool(context),
    save_daily_report: createSaveDailyReportTool(context),
  };
}
