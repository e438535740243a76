/**
 * Social publishing bindings.
 *
 * Posts are queued through Buffer when an access token is configured, and are
 * always saved locally so that the day's posts survive a missing or failing
 * scheduler.
 */
import { z } from 'zod';
import { fileStamp, minuteLabel, safeFileTitle } from '../artifacts';
import { ToolError } from '../errors';
import { parseResponse, toToolError } from './http';
import { defineTool, skipped, type SavedResult, type SkippedResult, type ToolContext } from './types';

const BUFFER_API = 'https://api.bufferapp.com/1';

export const SOCIAL_PLATFORMS = ['twitter', 'instagram', 'linkedin', 'facebook'] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

export interface QueuedPost {
  status: 'queued';
  platform: SocialPlatform;
  updateId: string | undefined;
}

const profilesSchema = z.array(
  z.object({
    id: z.string(),
    service: z.string(),
  })
);

const createUpdateSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  updates: z.array(z.object({ id: z.string().optional() })).optional(),
});

/**
 * Queue a post on the Buffer profile that matches the platform.
 */
export function createPostToBufferTool({ config, http, logger }: ToolContext) {
  return defineTool({
    name: 'post_to_buffer',
    description:
      'Schedule a social post through Buffer. Supported platforms: twitter, instagram, linkedin, facebook. Returns a skipped status when Buffer is not configured.',
    parameters: z.object({
      content: z.string().min(1).describe('The post text, already adapted to the platform'),
      platform: z.enum(SOCIAL_PLATFORMS).default('twitter').describe('Target platform (default: twitter)'),
    }),
    async run({ content, platform }): Promise<QueuedPost | SkippedResult> {
      const accessToken = config.social.bufferAccessToken;
      if (!accessToken) {
        return skipped('BUFFER_ACCESS_TOKEN not configured');
      }

      try {
        const profilesResponse = await http.get(`${BUFFER_API}/profiles.json`, {
          params: { access_token: accessToken },
        });
        const profiles = parseResponse('post_to_buffer', 'Buffer', profilesSchema, profilesResponse.data);
        const matching = profiles.filter((profile) => profile.service.toLowerCase() === platform);

        if (matching.length === 0) {
          const available = profiles.map((profile) => profile.service).join(', ') || 'none';
          throw new ToolError('post_to_buffer', `No ${platform} profile found in Buffer. Available: ${available}`);
        }

        const form = new URLSearchParams();
        form.append('access_token', accessToken);
        for (const profile of matching) {
          form.append('profile_ids[]', profile.id);
        }
        form.append('text', content);
        form.append('now', 'false');

        const response = await http.post(`${BUFFER_API}/updates/create.json`, form, {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        });
        const result = parseResponse('post_to_buffer', 'Buffer', createUpdateSchema, response.data);
        if (!result.success) {
          throw new ToolError('post_to_buffer', `Buffer error: ${result.message ?? 'unknown error'}`);
        }

        const updateId = result.updates?.[0]?.id;
        logger.info({ tool: 'post_to_buffer', platform, updateId }, 'Post queued in Buffer');
        return { status: 'queued', platform, updateId };
      } catch (error) {
        throw toToolError('post_to_buffer', 'Buffer', error);
      }
    },
  });
}

export function formatPost(content: string, platform: string, postType: string, createdAt: Date): string {
  return [
    `# ${platform.toUpperCase()} Post`,
    '',
    `**Type:** ${postType}`,
    `**Created:** ${minuteLabel(createdAt)}`,
    `**Platform:** ${platform}`,
    '',
    '---',
    '',
    content,
  ].join('\n');
}

/**
 * Save a post under posts/ as markdown.
 */
export function createSavePostTool({ artifacts, logger }: ToolContext) {
  return defineTool({
    name: 'save_post_locally',
    description: 'Save a social media post as a markdown file for later review or manual publishing.',
    parameters: z.object({
      content: z.string().min(1).describe('The post text'),
      platform: z.string().min(1).default('twitter').describe('Platform the post is written for'),
      post_type: z.string().min(1).default('text').describe('Post type, e.g. text, thread, carousel'),
    }),
    async run({ content, platform, post_type }): Promise<SavedResult> {
      const createdAt = artifacts.now();
      const normalized = platform.toLowerCase();
      const artifact = await artifacts.write(
        'posts',
        `${safeFileTitle(normalized)}-${fileStamp(createdAt)}`,
        '.md',
        formatPost(content, normalized, post_type, createdAt),
        createdAt
      );
      logger.info({ tool: 'save_post_locally', path: artifact.path }, 'Post saved');
      return { status: 'saved', path: artifact.path };
    },
  });
}
