/**
 * Crew compositions.
 *
 * A crew is an ordered list of tasks plus the agents that carry them out.
 * Tasks run sequentially; each task sees the outputs of its context tasks
 * (by default every task before it).
 */
import type { AgentRecord, AgentRecords } from '../agents/types';
import { CrewValidationError } from '../errors';
import { createAnalyticsTask, createContentTask, createEmailTask, createSeoTask, createSocialTask } from './tasks';
import type { Crew, CrewName, TaskRecord } from './types';

/**
 * Validate and freeze a crew.
 *
 * @throws CrewValidationError when the crew has no tasks, a task id repeats,
 *   a task's agent is not a member, or a context entry names a task that
 *   does not run earlier.
 */
export function defineCrew(name: CrewName, agents: readonly AgentRecord[], tasks: readonly TaskRecord[]): Crew {
  if (tasks.length === 0) {
    throw new CrewValidationError(`Crew "${name}" has no tasks`);
  }

  const members = new Set(agents.map((agent) => agent.kind));
  const seen = new Set<string>();

  for (const task of tasks) {
    if (seen.has(task.id)) {
      throw new CrewValidationError(`Crew "${name}" has duplicate task id "${task.id}"`);
    }
    if (!members.has(task.agent)) {
      throw new CrewValidationError(`Task "${task.id}" is assigned to "${task.agent}", which is not a member of crew "${name}"`);
    }
    for (const ref of task.context ?? []) {
      if (!seen.has(ref)) {
        throw new CrewValidationError(`Task "${task.id}" uses context "${ref}", which is not an earlier task in crew "${name}"`);
      }
    }
    seen.add(task.id);
  }

  return Object.freeze({
    name,
    agents: Object.freeze([...agents]),
    tasks: Object.freeze(tasks.map((task) => Object.freeze({ ...task }))),
  });
}

export function dailyContentCrew(agents: AgentRecords, niche: string): Crew {
  return defineCrew('daily-content', [agents.content, agents.social], [createContentTask(niche), createSocialTask()]);
}

export function seoCrew(agents: AgentRecords, topic: string, numArticles?: number): Crew {
  return defineCrew('seo', [agents.seo], [createSeoTask(topic, numArticles)]);
}

export function emailCrew(agents: AgentRecords, productName: string, valueProposition: string): Crew {
  return defineCrew('email', [agents.email], [createEmailTask(productName, valueProposition)]);
}

export function analyticsCrew(agents: AgentRecords): Crew {
  return defineCrew('analytics', [agents.analytics], [createAnalyticsTask()]);
}

/**
 * All five agents in sequence. The SEO task targets the niche.
 */
export function fullCrew(agents: AgentRecords, niche: string, productName: string, valueProposition: string): Crew {
  return defineCrew(
    'full',
    [agents.content, agents.social, agents.seo, agents.email, agents.analytics],
    [
      createContentTask(niche),
      createSocialTask(),
      createSeoTask(niche),
      createEmailTask(productName, valueProposition),
      createAnalyticsTask(),
    ]
  );
}
