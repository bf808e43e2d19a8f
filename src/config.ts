/**
 * Process-level settings read from the environment.
 *
 *   TOON_LOG_LEVEL  error | warn | info | verbose | debug | silly (default warn)
 *   TOON_MAX_DEPTH  nesting limit for parse and serialize (default 256)
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_MAX_DEPTH = 256;

const EnvSchema = z.object({
  TOON_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  TOON_MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
});

export interface ToonConfig {
  logLevel: LogLevel;
  maxDepth: number;
}

class ConfigManagerClass {
  private _cfg?: Readonly<ToonConfig>;

  get cfg(): Readonly<ToonConfig> {
    if (!this._cfg) this._cfg = this.load(process.env);
    return this._cfg;
  }

  /** Parses an environment record; invalid values fall back to defaults with a stderr note. */
  load(env: Record<string, string | undefined>): Readonly<ToonConfig> {
    const parsed = EnvSchema.safeParse({
      TOON_LOG_LEVEL: env['TOON_LOG_LEVEL'] || undefined,
      TOON_MAX_DEPTH: env['TOON_MAX_DEPTH'] || undefined,
    });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      process.stderr.write(`[toon] ignoring invalid environment settings (${issues})\n`);
      return Object.freeze({ logLevel: 'warn', maxDepth: DEFAULT_MAX_DEPTH });
    }
    return Object.freeze({
      logLevel: parsed.data.TOON_LOG_LEVEL,
      maxDepth: parsed.data.TOON_MAX_DEPTH,
    });
  }

  /** Forgets the cached config so the next read sees the current environment. */
  reset(): void {
    this._cfg = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();
