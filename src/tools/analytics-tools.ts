/**
 * Analytics bindings: read the latest metrics snapshot and persist the
 * daily report.
 *
 * The snapshot (analytics/latest_report.json) is produced outside this
 * service; its sections are keyed by source.
 */
import { z } from 'zod';
import { dayStamp } from '../artifacts';
import { ToolError, errorMessage } from '../errors';
import { defineTool, type SavedResult, type ToolContext } from './types';

export const ANALYTICS_REPORT_FILE = 'latest_report.json';

export const ANALYTICS_SOURCES = ['posts', 'emails', 'seo', 'all'] as const;

export type AnalyticsSource = (typeof ANALYTICS_SOURCES)[number];

export type AnalyticsReading =
  | { available: false; message: string }
  | { available: true; source: AnalyticsSource; data: unknown };

const NO_DATA_MESSAGE = 'No analytics data available yet. Run some campaigns first.';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createReadAnalyticsTool({ artifacts, logger }: ToolContext) {
  return defineTool({
    name: 'read_analytics',
    description:
      'Read the latest analytics snapshot. Sources: posts, emails, seo, all. Returns available=false when no data has been collected yet.',
    parameters: z.object({
      source: z.enum(ANALYTICS_SOURCES).default('all').describe('Section to read (default: all)'),
    }),
    async run({ source }): Promise<AnalyticsReading> {
      let data: unknown;
      try {
        data = await artifacts.readJson('analytics', ANALYTICS_REPORT_FILE);
      } catch (error) {
        throw new ToolError('read_analytics', `Could not read analytics report: ${errorMessage(error)}`, undefined, {
          cause: error,
        });
      }

      if (data === undefined) {
        logger.debug({ tool: 'read_analytics' }, 'No analytics report found');
        return { available: false, message: NO_DATA_MESSAGE };
      }

      if (source !== 'all' && isRecord(data) && source in data) {
        return { available: true, source, data: data[source] };
      }
      return { available: true, source: 'all', data };
    },
  });
}

export function formatDailyReport(day: string, report: string): string {
  return `# Daily Marketing Report - ${day}\n\n${report}`;
}

export function createSaveDailyReportTool({ artifacts, logger }: ToolContext) {
  return defineTool({
    name: 'save_daily_report',
    description: "Save today's marketing performance report as markdown.",
    parameters: z.object({
      report: z.string().min(1).describe('The full report in markdown'),
    }),
    async run({ report }): Promise<SavedResult> {
      const createdAt = artifacts.now();
      const day = dayStamp(createdAt);
      const artifact = await artifacts.write('reports', `daily-${day}`, '.md', formatDailyReport(day, report), createdAt);
      logger.info({ tool: 'save_daily_report', path: artifact.path }, 'Daily report saved');
      return { status: 'saved', path: artifact.path };
    },
  });
}
