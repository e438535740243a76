/**
 * Wires the production object graph: HTTP client, artifact store, tool
 * bindings, agent records, the AgentKit crew runner and the pipelines.
 *
 * Shared by the server and the CLI. Tests build the same graph with a
 * scripted runner instead (see __tests__/utils).
 */
import { createAgentRecords } from './agents';
import { ArtifactStore } from './artifacts';
import type { Config } from './config';
import { AgentKitCrewRunner } from './crews/agentkit-runner';
import type { Logger } from './logger';
import { createPipelines, type Pipelines } from './pipelines';
import { createHttpClient, createToolBindings } from './tools';

export interface Runtime {
  pipelines: Pipelines;
  artifacts: ArtifactStore;
}

export async function createRuntime(config: Config, logger: Logger): Promise<Runtime> {
  const artifacts = new ArtifactStore(config.output.dir);
  await artifacts.ensureLayout();

  const bindings = createToolBindings({
    config,
    http: createHttpClient(config),
    artifacts,
    logger: logger.child({ component: 'tools' }),
  });
  const agents = createAgentRecords(config);
  const runner = new AgentKitCrewRunner({ config, bindings, logger });

  logger.info(
    { provider: config.llm.provider, model: config.llm.model, outputDir: artifacts.rootDir },
    'Marketing crew runtime ready'
  );

  return {
    pipelines: createPipelines({ agents, runner, logger }),
    artifacts,
  };
}
