/**
 * Centralized Configuration Module
 *
 * Loads the gateway connection settings from environment variables and
 * validates them into an immutable GatewayConfig.
 */
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './mcp-client/errors.js';
import type { GatewayConfig } from './mcp-client/types.js';

export type Environment = Record<string, string | undefined>;

/** Empty assignments in a .env file mean "not set" */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/**
 * Accepts a JSON array or a comma separated list
 */
function parseToolList(value: unknown): unknown {
  const raw = blankToUndefined(value);
  if (typeof raw !== 'string') {
    return raw;
  }
  const text = raw.trim();
  if (text.startsWith('[')) {
    try {
      return JSON.parse(text);
    } catch {
      // left as a string so the schema reports it
      return text;
    }
  }
  return text
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

function seconds(min: number, max: number, defaultValue: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(defaultValue));
}

function milliseconds(defaultValue: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(defaultValue));
}

const ToolListSchema = z.array(z.string().min(1, 'tool names must not be empty'), {
  invalid_type_error: 'expected a comma separated list or a JSON array of names',
});

const EnvironmentSchema = z
  .object({
    MCP_GATEWAY_URL: z.preprocess(
      blankToUndefined,
      z
        .string({ required_error: 'is required' })
        .url('must be an absolute URL')
        .refine(url => /^https?:\/\//i.test(url), 'must use http or https')
    ),
    MCP_GATEWAY_AUTH_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
    MCP_GATEWAY_ALLOWED_TOOLS: z.preprocess(parseToolList, ToolListSchema.optional()),
    MCP_GATEWAY_BLOCKED_TOOLS: z.preprocess(parseToolList, ToolListSchema.default([])),
    MCP_GATEWAY_TIMEOUT_CONNECTION: seconds(5, 60, 10),
    MCP_GATEWAY_TIMEOUT_EXECUTION: seconds(10, 120, 60),
    MCP_GATEWAY_TIMEOUT_REFRESH: seconds(5, 120, 30),
    MCP_GATEWAY_REFRESH_INTERVAL: seconds(1, 86_400, 300),
    MCP_GATEWAY_BACKOFF_INITIAL_MS: milliseconds(1_000),
    MCP_GATEWAY_BACKOFF_MAX_MS: milliseconds(300_000),
    MCP_GATEWAY_MAX_REFRESH_FAILURES: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0)),
    MCP_GATEWAY_JOURNAL_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  })
  .superRefine((env, ctx) => {
    if (env.MCP_GATEWAY_BACKOFF_MAX_MS < env.MCP_GATEWAY_BACKOFF_INITIAL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MCP_GATEWAY_BACKOFF_MAX_MS'],
        message: 'must not be smaller than MCP_GATEWAY_BACKOFF_INITIAL_MS',
      });
    }
  });

/**
 * Validate an environment into a frozen GatewayConfig
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Environment): GatewayConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    );
  }
  const vars = parsed.data;

  const config: GatewayConfig = {
    url: vars.MCP_GATEWAY_URL.replace(/\/+$/, ''),
    authToken: vars.MCP_GATEWAY_AUTH_TOKEN,
    allowedTools: vars.MCP_GATEWAY_ALLOWED_TOOLS ? Object.freeze([...vars.MCP_GATEWAY_ALLOWED_TOOLS]) : undefined,
    blockedTools: Object.freeze([...vars.MCP_GATEWAY_BLOCKED_TOOLS]),
    connectTimeoutMs: vars.MCP_GATEWAY_TIMEOUT_CONNECTION * 1000,
    executionTimeoutMs: vars.MCP_GATEWAY_TIMEOUT_EXECUTION * 1000,
    refreshTimeoutMs: vars.MCP_GATEWAY_TIMEOUT_REFRESH * 1000,
    refreshIntervalMs: vars.MCP_GATEWAY_REFRESH_INTERVAL * 1000,
    backoffInitialMs: vars.MCP_GATEWAY_BACKOFF_INITIAL_MS,
    backoffMaxMs: vars.MCP_GATEWAY_BACKOFF_MAX_MS,
    maxRefreshFailures: vars.MCP_GATEWAY_MAX_REFRESH_FAILURES,
    journalPath: vars.MCP_GATEWAY_JOURNAL_PATH,
  };
  return Object.freeze(config);
}

/**
 * Load variables from .env into process.env, then validate process.env
 */
export function configFromEnvironment(): GatewayConfig {
  const result = dotenv.config();

  // a missing .env file is normal; anything else is worth a warning
  if (result.error && !isMissingFile(result.error)) {
    console.error('[CONFIG] Warning: dotenv.config() failed:', result.error.message);
  }
  return loadConfig(process.env);
}

function isMissingFile(err: Error): boolean {
  return 'code' in err && err.code === 'ENOENT';
}
