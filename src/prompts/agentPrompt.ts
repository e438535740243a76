/**
 * System prompt for the marketing agents.
 *
 * The prompt is rebuilt on every inference so that it always describes the
 * task currently in progress and the outputs handed over from earlier tasks.
 */
import type { AgentRecord } from '../agents/types';
import type { Crew, TaskOutput, TaskRecord } from '../crews/types';

function buildContextSection(context: readonly TaskOutput[]): string {
  if (context.length === 0) return '';

  const sections = context.map((item) => `### From the ${item.agent} task (${item.taskId})\n${item.output}`);
  return `\n## Context from Previous Tasks\n\n${sections.join('\n\n')}\n`;
}

function buildTaskSection(task: TaskRecord | undefined): string {
  if (!task) {
    return `
## Current Task
There is no task assigned to you right now. Reply briefly and stop.
`;
  }

  return `
## Current Task
${task.description}

## Expected Output
${task.expectedOutput}
`;
}

/**
 * Generate the system prompt for one agent.
 */
export function buildAgentPrompt(
  agent: AgentRecord,
  task: TaskRecord | undefined,
  context: readonly TaskOutput[] = []
): string {
  return `You are the ${agent.role}.

## Your Goal
${agent.goal}

## Background
${agent.backstory}

## Available Tools
${agent.toolNames.map((name) => `- ${name}`).join('\n')}
- complete_task: Hand in your final result when the task is done
${buildTaskSection(task)}${buildContextSection(context)}
## How to Finish
Work through the task with your tools. When you are done, call complete_task
with your final result, written to match the expected output. Do not ask
questions: nobody will answer them.`;
}

/**
 * The user message that starts a crew run.
 */
export function buildKickoffMessage(crew: Crew): string {
  const steps = crew.tasks.map((task, index) => `${index + 1}. ${task.id} (${task.agent})`).join('\n');
  return `Run the ${crew.name} marketing workflow. Tasks, in order:\n${steps}`;
}
