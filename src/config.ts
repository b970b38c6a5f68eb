import { homedir } from "node:os";
import { join } from "node:path";

export type EngineConfig = {
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Fraction of the delay applied as uniform ± jitter (0 disables it). */
    jitter: number;
  };
  timeouts: {
    taskDefault: number;
  };
  limits: {
    /** Cap on tasks in flight per engine (0 = no cap). */
    maxConcurrency: number;
    contextExcerptLength: number;
    maxRuns: number;
  };
  server: {
    port: number;
    host: string;
  };
  store: {
    path: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: EngineConfig = {
  retry: {
    maxAttempts: 3,
    baseDelayMs: 2_000,
    maxDelayMs: 30_000,
    jitter: 0,
  },
  timeouts: {
    taskDefault: 120_000,
  },
  limits: {
    maxConcurrency: 0,
    contextExcerptLength: 500,
    maxRuns: 50,
  },
  server: {
    port: 3000,
    host: "127.0.0.1",
  },
  store: {
    path: join(homedir(), ".sectionflow", "runs.db"),
  },
};

let current: EngineConfig = structuredClone(DEFAULTS);

function merge(base: EngineConfig, overrides: DeepPartial<EngineConfig>): EngineConfig {
  return {
    retry: mergeSection(base.retry, overrides.retry),
    timeouts: mergeSection(base.timeouts, overrides.timeouts),
    limits: mergeSection(base.limits, overrides.limits),
    server: mergeSection(base.server, overrides.server),
    store: mergeSection(base.store, overrides.store),
  };
}

/** Undefined override values keep the base value. */
function mergeSection<T extends object>(base: T, overrides: Partial<T> | undefined): T {
  const result: T = { ...base };
  for (const [key, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) Reflect.set(result, key, value);
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<EngineConfig>): void {
  current = merge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));
