/**
 * Shared types for tool bindings.
 *
 * A binding is a thin wrapper around one external API call or one artifact
 * write. Bindings know nothing about the orchestration framework: the crew
 * runner adapts them into framework tools, and tests call `run` directly.
 *
 * ## Factory Pattern
 *
 * Bindings are created by factories that receive a ToolContext, so that
 * credentials, the HTTP client and the artifact store are injected once at
 * startup:
 *
 * ```typescript
 * const bindings = createToolBindings({ config, http, artifacts, logger });
 * await bindings.google_search.run({ query: 'ai marketing tools' });
 * ```
 */
import type { AxiosInstance } from 'axios';
import type { z } from 'zod';
import type { ArtifactStore } from '../artifacts';
import type { Config } from '../config';
import type { Logger } from '../logger';

export type ToolName =
  | 'search_trends'
  | 'google_search'
  | 'post_to_buffer'
  | 'save_post_locally'
  | 'keyword_research'
  | 'save_seo_article'
  | 'send_email_campaign'
  | 'save_email_draft'
  | 'send_telegram'
  | 'read_analytics'
  | 'save_daily_report';

/**
 * Dependencies injected into every binding factory.
 */
export interface ToolContext {
  config: Config;
  http: AxiosInstance;
  artifacts: ArtifactStore;
  logger: Logger;
}

export interface ToolBinding<S extends z.ZodTypeAny = z.ZodTypeAny, R = unknown> {
  readonly name: ToolName;
  readonly description: string;
  readonly parameters: S;
  run(input: z.output<S>): Promise<R>;
}

export type ToolBindings = { readonly [K in ToolName]: ToolBinding };

/**
 * Returned by publishing bindings whose credentials are not configured.
 * Not a failure: the agent is expected to fall back to a local save.
 */
export interface SkippedResult {
  status: 'skipped';
  reason: string;
}

/**
 * Returned by bindings that write an artifact.
 */
export interface SavedResult {
  status: 'saved';
  path: string;
}

export function defineTool<S extends z.ZodTypeAny, R>(binding: ToolBinding<S, R>): ToolBinding<S, R> {
  return Object.freeze(binding);
}

export function skipped(reason: string): SkippedResult {
  return { status: 'skipped', reason };
}
