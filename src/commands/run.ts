import chalk from 'chalk';
import { errorMessage } from '../errors';
import type { PipelineResult, Pipelines } from '../pipelines';

export const RESULT_PREVIEW_LENGTH = 2000;

export interface CliOutput {
  print(text: string): void;
  printError(text: string): void;
  setExitCode(code: number): void;
}

export interface RunDeps extends CliOutput {
  /** Builds the runtime; deferred so that --help never needs credentials */
  loadPipelines(): Promise<Pipelines>;
}

export interface RunSelection {
  /** e.g. "Running SEO pipeline for:" */
  label: string;
  subject?: string;
  run(pipelines: Pipelines): Promise<PipelineResult>;
}

function banner(): string {
  const line = '━'.repeat(40);
  return chalk.green.bold(`${line}\n  MARKETING AGENT PIPELINE\n${line}`);
}

export function preview(output: string): string {
  return output.slice(0, RESULT_PREVIEW_LENGTH);
}

/**
 * Run one pipeline and print its result. Failures set exit code 1.
 */
export async function runPipeline(deps: RunDeps, selection: RunSelection): Promise<void> {
  deps.print(banner());
  deps.print(selection.subject ? `${chalk.bold(selection.label)} ${selection.subject}` : chalk.bold(selection.label));

  try {
    const pipelines = await deps.loadPipelines();
    const result = await selection.run(pipelines);

    deps.print(chalk.green(`\n✓ Complete (${(result.durationMs / 1000).toFixed(1)}s)\n`));
    deps.print(chalk.cyan('Result'));
    deps.print(preview(result.output));
  } catch (error) {
    deps.printError(chalk.red(`\n❌ Error: ${errorMessage(error)}\n`));
    deps.setExitCode(1);
  }
}
