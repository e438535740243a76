/**
 * Marketing playbook constants embedded in task descriptions.
 *
 * Centralized so that the task builders and their tests agree on the
 * schedule and sequence shape.
 */

/** Optimal posting hours (24h, local time) per platform */
export const POSTING_HOURS = {
  twitter: [9, 13, 18],
  instagram: [11, 19],
  linkedin: [8, 12],
} as const;

export const DEFAULT_CONTENT_PLATFORMS: readonly string[] = ['twitter', 'instagram', 'linkedin'];

/** What the content agent writes for each platform */
export const PLATFORM_DELIVERABLES: Readonly<Record<string, string>> = {
  twitter: '3 tweets (max 280 chars each, include hashtags)',
  instagram: '1 caption (with emojis, hashtags, CTA)',
  linkedin: '1 professional post (thought leadership style)',
  facebook: '1 conversational post (question or story, with CTA)',
};

export const MIN_ARTICLE_WORDS = 1500;

export const DEFAULT_ARTICLE_COUNT = 3;
export const MAX_ARTICLE_COUNT = 20;

export interface SequenceStep {
  day: number;
  name: string;
  purpose: string;
}

export const EMAIL_SEQUENCE: readonly SequenceStep[] = [
  { day: 0, name: 'Welcome email', purpose: 'introduce brand, set expectations' },
  { day: 2, name: 'Value email #1', purpose: 'educational content, no selling' },
  { day: 4, name: 'Case study', purpose: 'social proof, results' },
  { day: 6, name: 'Value email #2', purpose: 'more education, tips' },
  { day: 8, name: 'Soft CTA', purpose: 'introduce product naturally' },
  { day: 10, name: 'Promotion', purpose: 'clear offer, urgency' },
  { day: 14, name: 'Feedback', purpose: 'ask for input, re-engage' },
];

export const DEFAULT_NICHE = 'AI and technology';
export const DEFAULT_SEO_TOPIC = 'AI tools';

/**
 * "9 AM, 1 PM, 6 PM"
 */
export function formatHours(hours: readonly number[]): string {
  return hours
    .map((hour) => {
      const suffix = hour < 12 ? 'AM' : 'PM';
      const display = hour % 12 === 0 ? 12 : hour % 12;
      return `${display} ${suffix}`;
    })
    .join(', ');
}
