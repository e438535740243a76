/**
 * Marketing agent records.
 *
 * Each factory describes one agent (role, goal, backstory, tools, LLM
 * profile). The records are framework-independent; the crew runner builds
 * the actual agents for each run.
 *
 * ```typescript
 * const agents = createAgentRecords(config);
 * agents.seo.toolNames; // ['keyword_research', 'google_search', 'save_seo_article']
 * ```
 */
import type { Config } from '../config';
import { createAnalyticsAgent } from './analytics';
import { createContentAgent } from './content';
import { createEmailAgent } from './email';
import { createSeoAgent } from './seo';
import { createSocialAgent } from './social';
import type { AgentRecords } from './types';

export * from './types';
export { createAnalyticsAgent, createContentAgent, createEmailAgent, createSeoAgent, createSocialAgent };

export function createAgentRecords(config: Config): AgentRecords {
  const options = { maxIter: config.agents.maxIterPerTask };
  const records: AgentRecords = {
    content: createContentAgent(options),
    social: createSocialAgent(options),
    seo: createSeoAgent(options),
    email: createEmailAgent(options),
    analytics: createAnalyticsAgent(options),
  };
  for (const record of Object.values(records)) {
    Object.freeze(record);
  }
  return Object.freeze(records);
}
