/**
 * Email bindings: MailerLite campaigns and local drafts.
 */
import { z } from 'zod';
import { fileStamp, minuteLabel, twoDigit } from '../artifacts';
import { parseResponse, toToolError } from './http';
import { defineTool, skipped, type SavedResult, type SkippedResult, type ToolContext } from './types';

const MAILERLITE_CAMPAIGNS_URL = 'https://connect.mailerlite.com/api/campaigns';

export interface CreatedCampaign {
  status: 'created';
  subject: string;
  campaignId: string | undefined;
}

const campaignResponseSchema = z
  .object({
    data: z.object({ id: z.union([z.string(), z.number()]).optional() }).optional(),
  })
  .optional();

interface CampaignEmail {
  subject: string;
  from_name: string;
  content: string;
  from?: string;
}

interface CampaignRequest {
  name: string;
  type: 'regular';
  emails: CampaignEmail[];
  groups?: string[];
}

/**
 * Create a regular MailerLite campaign. Without a group the campaign targets
 * all subscribers.
 */
export function createSendCampaignTool({ config, http, artifacts, logger }: ToolContext) {
  return defineTool({
    name: 'send_email_campaign',
    description:
      'Create an email campaign in MailerLite. Sends to all subscribers unless a group id is given. Returns a skipped status when MailerLite is not configured.',
    parameters: z.object({
      subject: z.string().min(1).describe('Email subject line'),
      content: z.string().min(1).describe('Email body (HTML or plain text)'),
      group_id: z.string().min(1).optional().describe('MailerLite subscriber group id'),
    }),
    async run({ subject, content, group_id }): Promise<CreatedCampaign | SkippedResult> {
      const apiKey = config.email.mailerliteApiKey;
      if (!apiKey) {
        return skipped('MAILERLITE_API_KEY not configured');
      }

      const email: CampaignEmail = { subject, from_name: config.email.fromName, content };
      if (config.email.fromEmail) {
        email.from = config.email.fromEmail;
      }
      const campaign: CampaignRequest = {
        name: `Auto Campaign - ${minuteLabel(artifacts.now())}`,
        type: 'regular',
        emails: [email],
      };
      if (group_id) {
        campaign.groups = [group_id];
      }

      try {
        const response = await http.post(MAILERLITE_CAMPAIGNS_URL, campaign, {
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
        });
        const body = parseResponse('send_email_campaign', 'MailerLite', campaignResponseSchema, response.data);
        const id = body?.data?.id;
        const campaignId = id === undefined ? undefined : String(id);
        logger.info({ tool: 'send_email_campaign', campaignId }, 'Email campaign created');
        return { status: 'created', subject, campaignId };
      } catch (error) {
        throw toToolError('send_email_campaign', 'MailerLite', error);
      }
    },
  });
}

export function formatEmailDraft(subject: string, content: string, position: number, createdAt: Date): string {
  return (
    '# Email Draft\n\n' +
    `**Subject:** ${subject}\n` +
    `**Sequence Position:** ${position}\n` +
    `**Created:** ${minuteLabel(createdAt)}\n\n---\n\n` +
    content
  );
}

export function createSaveEmailDraftTool({ artifacts, logger }: ToolContext) {
  return defineTool({
    name: 'save_email_draft',
    description: 'Save an email draft locally, numbered by its position in the sequence.',
    parameters: z.object({
      subject: z.string().min(1).describe('Email subject line'),
      content: z.string().min(1).describe('Email body'),
      sequence_position: z.number().int().min(1).default(1).describe('Position in the sequence, starting at 1'),
    }),
    async run({ subject, content, sequence_position }): Promise<SavedResult> {
      const createdAt = artifacts.now();
      const artifact = await artifacts.write(
        'emails',
        `seq${twoDigit(sequence_position)}-${fileStamp(createdAt)}`,
        '.md',
        formatEmailDraft(subject, content, sequence_position, createdAt),
        createdAt
      );
      logger.info({ tool: 'save_email_draft', path: artifact.path }, 'Email draft saved');
      return { status: 'saved', path: artifact.path };
    },
  });
}
