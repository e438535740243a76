/**
 * Error taxonomy shared by bindings, crews, pipelines and the server.
 */

export class ConfigError extends Error {
  readonly problems: readonly string[];

  constructor(problems: string[]) {
    super(`Configuration errors:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * An external API rejected or could not be reached by a tool binding.
 * Never retried.
 */
export class ToolError extends Error {
  readonly tool: string;
  readonly status: number | undefined;

  constructor(tool: string, message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ToolError';
    this.tool = tool;
    this.status = status;
  }
}

/**
 * A crew composition broke one of its invariants (unknown agent, duplicate
 * task id, forward context reference).
 */
export class CrewValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrewValidationError';
  }
}

export type PipelineErrorKind = 'invalid_params' | 'tool_failed' | 'incomplete' | 'crew_failed';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
