/**
 * Task builders for the marketing crews.
 *
 * Descriptions are what the assigned agent receives as its current task;
 * the playbook numbers come from constants/marketing.
 */
import {
  DEFAULT_ARTICLE_COUNT,
  DEFAULT_CONTENT_PLATFORMS,
  EMAIL_SEQUENCE,
  MIN_ARTICLE_WORDS,
  PLATFORM_DELIVERABLES,
  POSTING_HOURS,
  formatHours,
  type SequenceStep,
} from '../constants/marketing';
import type { TaskRecord } from './types';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function deliverableFor(platform: string): string {
  const key = platform.toLowerCase();
  const label = key === 'linkedin' ? 'LinkedIn' : capitalize(key);
  return `- ${label}: ${PLATFORM_DELIVERABLES[key] ?? '1 post adapted to the platform'}`;
}

export function createContentTask(niche: string, platforms: readonly string[] = DEFAULT_CONTENT_PLATFORMS): TaskRecord {
  const selected = platforms.length > 0 ? platforms : DEFAULT_CONTENT_PLATFORMS;
  return {
    id: 'content',
    agent: 'content',
    description: [
      `Research the latest trends in '${niche}' and create engaging content for these platforms: ${selected.join(', ')}.`,
      '',
      'For each platform, create:',
      ...selected.map(deliverableFor),
      '',
      'Research trending topics first, then create platform-optimized content. Save each post using the save tool.',
    ].join('\n'),
    expectedOutput:
      'A set of platform-specific posts saved to files, with a summary of what was created and why these topics were chosen.',
  };
}

export function createSocialTask(postsSummary = ''): TaskRecord {
  return {
    id: 'social',
    agent: 'social',
    description: [
      'Review the generated content and schedule it for posting.',
      '',
      `Context from content team: ${postsSummary}`,
      '',
      'For each post:',
      '1. Review and optimize the copy if needed',
      '2. Add appropriate hashtags if missing',
      '3. Schedule via Buffer at optimal times',
      '4. If Buffer is not configured, save posts locally with scheduling notes',
      '',
      'Optimal posting times:',
      `- Twitter: ${formatHours(POSTING_HOURS.twitter)}`,
      `- Instagram: ${formatHours(POSTING_HOURS.instagram)}`,
      `- LinkedIn: ${formatHours(POSTING_HOURS.linkedin)}`,
    ].join('\n'),
    expectedOutput: 'Confirmation of posts scheduled or saved, with platform, time, and content summary for each.',
  };
}

export function createSeoTask(topic: string, numArticles: number = DEFAULT_ARTICLE_COUNT): TaskRecord {
  return {
    id: 'seo',
    agent: 'seo',
    description: [
      `Create ${numArticles} SEO-optimized articles about '${topic}'.`,
      '',
      'Steps:',
      '1. Research keywords using the keyword tool',
      '2. Find long-tail keywords with high intent',
      '3. For each article:',
      `   - Write ${MIN_ARTICLE_WORDS}+ word comprehensive article`,
      '   - Include target keyword in title, H2s, and naturally in body',
      '   - Add internal linking suggestions',
      "   - Include FAQ section targeting 'People Also Ask' queries",
      '   - Save using the article save tool',
    ].join('\n'),
    expectedOutput: 'Articles saved with target keywords, word count, and SEO optimization notes for each.',
  };
}

function describeStep(step: SequenceStep, index: number): string {
  const timing = step.day === 0 ? 'immediate' : `day ${step.day}`;
  return `${index + 1}. ${step.name} (${timing}) - ${step.purpose}`;
}

export function createEmailTask(productName: string, valueProposition: string): TaskRecord {
  const count = EMAIL_SEQUENCE.length;
  return {
    id: 'email',
    agent: 'email',
    description: [
      `Create a ${count}-email nurture sequence for '${productName}'.`,
      '',
      `Value proposition: ${valueProposition}`,
      '',
      'Email sequence:',
      ...EMAIL_SEQUENCE.map(describeStep),
      '',
      'For each email, write compelling subject line and full body. Save each as a draft.',
    ].join('\n'),
    expectedOutput: `${count} email drafts saved with subject lines, send timing, and expected open/click rates.`,
  };
}

export function createAnalyticsTask(): TaskRecord {
  return {
    id: 'analytics',
    agent: 'analytics',
    description: [
      'Review all marketing performance data and create a daily report.',
      '',
      'Analyze:',
      '1. Social media: engagement rates, follower growth, top posts',
      '2. Email: open rates, click rates, unsubscribes',
      '3. SEO: organic traffic, keyword rankings, new pages indexed',
      '4. Overall: conversion rates, lead count, revenue if available',
      '',
      'Then:',
      '- Identify top 3 wins',
      '- Identify top 3 areas for improvement',
      '- Provide specific action items for tomorrow',
      '- Save the report and send a Telegram summary to the owner',
    ].join('\n'),
    expectedOutput: 'Daily report saved and Telegram notification sent with key metrics and action items.',
  };
}
