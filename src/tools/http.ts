/**
 * HTTP plumbing shared by the API bindings.
 *
 * One axios instance is created at startup with the configured timeout.
 * Nothing is retried: a failed request becomes a ToolError that the crew
 * runner turns into a pipeline failure.
 */
import axios, { type AxiosInstance } from 'axios';
import type { z } from 'zod';
import type { Config } from '../config';
import { ToolError, errorMessage } from '../errors';

const MAX_DETAIL_LENGTH = 200;

export function createHttpClient(config: Config): AxiosInstance {
  return axios.create({
    timeout: config.http.timeoutMs,
    headers: {
      'User-Agent': 'marketing-crew/1.0',
    },
  });
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') return '';
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return ` - ${text.slice(0, MAX_DETAIL_LENGTH)}`;
}

/**
 * Convert anything thrown while calling `service` into a ToolError.
 */
export function toToolError(tool: string, service: string, error: unknown): ToolError {
  if (error instanceof ToolError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new ToolError(tool, `${service} API error: ${status}${describeBody(error.response?.data)}`, status, {
        cause: error,
      });
    }
    return new ToolError(tool, `${service} API unreachable: ${error.message}`, undefined, { cause: error });
  }

  return new ToolError(tool, `${service} request failed: ${errorMessage(error)}`, undefined, { cause: error });
}

/**
 * Parse an upstream payload, reporting schema drift as a tool failure.
 */
export function parseResponse<S extends z.ZodTypeAny>(tool: string, service: string, schema: S, data: unknown): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0]?.message ?? 'invalid payload';
    throw new ToolError(tool, `${service} returned an unexpected response: ${issue}`);
  }
  return parsed.data;
}

export function requireKey(tool: string, key: string | undefined, variable: string): string {
  if (!key) {
    throw new ToolError(tool, `${variable} is not configured`);
  }
  return key;
}
