#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * ```
 * marketing-crew content --niche "AI tools for developers"
 * marketing-crew seo --topic "best AI marketing tools" --articles 5
 * marketing-crew email --product "MarketBot" --value "AI marketing on autopilot"
 * marketing-crew analytics
 * marketing-crew full --niche "AI tools" --product "MarketBot" --value "AI marketing"
 * ```
 */
import dotenv from 'dotenv';
dotenv.config();

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { runPipeline, type RunDeps } from './commands/run';
import { loadConfig, validateConfig } from './config';
import { DEFAULT_ARTICLE_COUNT } from './constants/marketing';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { Pipelines } from './pipelines';

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function createProgram(deps: RunDeps): Command {
  const program = new Command();

  program
    .name('marketing-crew')
    .description('Marketing agent pipeline - AI-powered marketing automation')
    .version('1.0.0')
    .configureOutput({
      writeOut: (text) => deps.print(text.trimEnd()),
      writeErr: (text) => deps.printError(text.trimEnd()),
    })
    .action((_options: unknown, command: Command) => {
      const [name] = command.args;
      if (name !== undefined) {
        deps.printError(`error: unknown command '${name}'`);
        deps.setExitCode(1);
        return;
      }
      program.outputHelp();
    });

  program
    .command('content')
    .description('Daily content creation + scheduling')
    .requiredOption('--niche <niche>', 'Target niche')
    .action(async (options: { niche: string }) => {
      await runPipeline(deps, {
        label: 'Running content pipeline for:',
        subject: options.niche,
        run: (pipelines) => pipelines.runDailyContent({ niche: options.niche }),
      });
    });

  program
    .command('seo')
    .description('SEO keyword research + article generation')
    .requiredOption('--topic <topic>', 'Topic for articles')
    .option('--articles <n>', 'Number of articles', parseCount, DEFAULT_ARTICLE_COUNT)
    .action(async (options: { topic: string; articles: number }) => {
      await runPipeline(deps, {
        label: 'Running SEO pipeline for:',
        subject: options.topic,
        run: (pipelines) => pipelines.runSeoContent({ topic: options.topic, numArticles: options.articles }),
      });
    });

  program
    .command('email')
    .description('Email nurture sequence generation')
    .requiredOption('--product <name>', 'Product name')
    .option('--value <text>', 'Value proposition', '')
    .action(async (options: { product: string; value: string }) => {
      await runPipeline(deps, {
        label: 'Creating email sequence for:',
        subject: options.product,
        run: (pipelines) =>
          pipelines.runEmailSequence({ productName: options.product, valueProposition: options.value }),
      });
    });

  program
    .command('analytics')
    .description('Daily analytics review')
    .action(async () => {
      await runPipeline(deps, {
        label: 'Running analytics review...',
        run: (pipelines) => pipelines.runAnalyticsReport(),
      });
    });

  program
    .command('full')
    .description('Run full marketing pipeline')
    .requiredOption('--niche <niche>', 'Target niche')
    .requiredOption('--product <name>', 'Product name')
    .option('--value <text>', 'Value proposition', '')
    .action(async (options: { niche: string; product: string; value: string }) => {
      await runPipeline(deps, {
        label: 'Running FULL pipeline for:',
        subject: options.niche,
        run: (pipelines) =>
          pipelines.runFullPipeline({
            niche: options.niche,
            productName: options.product,
            valueProposition: options.value,
          }),
      });
    });

  return program;
}

/**
 * Build the production runtime. The AgentKit runner is loaded here, not at
 * module load, so that `--help` and argument errors need no configuration.
 */
async function loadPipelines(): Promise<Pipelines> {
  const config = loadConfig();
  validateConfig(config);
  const { createRuntime } = await import('./runtime');
  const runtime = await createRuntime(config, logger);
  return runtime.pipelines;
}

if (require.main === module) {
  createProgram({
    loadPipelines,
    print: (text) => console.log(text),
    printError: (text) => console.error(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  })
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      process.exitCode = 1;
    });
}
