/**
 * @module @sprig/plugin-execution/config
 *
 * Host configuration. Precedence: defaults < environment < explicit options.
 *
 * Environment:
 * - SPRIG_PLUGINS_URL: grammar manifest URL
 * - SPRIG_CDN: `jsdelivr`, `unpkg` or a base URL
 * - SPRIG_VERSION: grammar package version
 * - SPRIG_TIMEOUT_MS: highlight call bound
 * - SPRIG_ISOLATION: `process` or `none`
 * - SPRIG_LOG_LEVEL: debug | info | warn | error | silent
 */

import { z } from 'zod';
import { ConfigError } from '@sprig/plugin-contracts';

export const highlighterConfigSchema = z.object({
  /** Embedding layer: skip automatic highlighting on load */
  manual: z.boolean().default(false),
  /** Embedding layer: theme identifier */
  theme: z.string().min(1).default('one-dark'),
  /** Embedding layer: selector for discoverable code blocks */
  selector: z.string().min(1).default('pre code'),
  cdn: z.string().min(1).default('jsdelivr'),
  version: z.string().min(1).default('latest'),
  /** Grammar manifest URL; replaces the CDN catalog */
  pluginsUrl: z.string().url().optional(),
  /** Base URL for locally hosted assets */
  hostUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(10_000),
  /**
   * `process` runs each grammar in a child process that is killed when a
   * call overruns `timeoutMs`. `none` runs grammars on the calling thread,
   * where a call that never returns cannot be stopped.
   */
  isolation: z.enum(['process', 'none']).default('process'),
  /** How deep injected languages may nest; 0 disables injections */
  injectionDepth: z.number().int().nonnegative().default(3),
  /** Cache bound; least recently used instances are evicted past it */
  maxInstances: z.number().int().positive().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type HighlighterConfig = z.infer<typeof highlighterConfigSchema>;
export type HighlighterConfigInput = z.input<typeof highlighterConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Read the configuration keys the environment can set.
 */
export function configFromEnv(env: Env = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.SPRIG_PLUGINS_URL) {
    config.pluginsUrl = env.SPRIG_PLUGINS_URL;
  }
  if (env.SPRIG_CDN) {
    config.cdn = env.SPRIG_CDN;
  }
  if (env.SPRIG_VERSION) {
    config.version = env.SPRIG_VERSION;
  }
  if (env.SPRIG_TIMEOUT_MS) {
    const timeoutMs = Number(env.SPRIG_TIMEOUT_MS);
    if (!Number.isFinite(timeoutMs)) {
      throw new ConfigError(`SPRIG_TIMEOUT_MS must be a number, got "${env.SPRIG_TIMEOUT_MS}"`, {
        key: 'SPRIG_TIMEOUT_MS',
      });
    }
    config.timeoutMs = timeoutMs;
  }
  if (env.SPRIG_ISOLATION) {
    config.isolation = env.SPRIG_ISOLATION;
  }
  if (env.SPRIG_LOG_LEVEL) {
    config.logLevel = env.SPRIG_LOG_LEVEL;
  }

  return config;
}

/**
 * Merge and validate configuration.
 *
 * @throws ConfigError when a value is invalid
 */
export function resolveConfig(options: HighlighterConfigInput = {}, env: Env = process.env): HighlighterConfig {
  const explicit = Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
  const parsed = highlighterConfigSchema.safeParse({ ...configFromEnv(env), ...explicit });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid highlighter config: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
