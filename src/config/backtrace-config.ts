import { z } from 'zod';
import { ConfigError } from '../errors/config-error';
import { currentLogger } from '../errors/logger';

export const BACKTRACE_ENV_VAR = 'ERRBOX_BACKTRACE';
export const LIB_BACKTRACE_ENV_VAR = 'ERRBOX_LIB_BACKTRACE';
export const BACKTRACE_LIMIT_ENV_VAR = 'ERRBOX_BACKTRACE_LIMIT';

export const DEFAULT_FRAME_LIMIT = 50;

const DISABLED_VALUES = new Set(['0', 'false', 'off']);

const FrameLimit = z.coerce
  .number({
    invalid_type_error: 'Frame limit must be a number',
  })
  .int('Frame limit must be an integer')
  .positive('Frame limit must be positive')
  .max(1000, 'Frame limit must not exceed 1000');

export const BacktraceEnvSchema = z.object({
  [LIB_BACKTRACE_ENV_VAR]: z.string().optional(),
  [BACKTRACE_ENV_VAR]: z.string().optional(),
  [BACKTRACE_LIMIT_ENV_VAR]: FrameLimit.optional(),
});

export const BacktraceConfigSchema = z.object({
  enabled: z.boolean(),
  frameLimit: FrameLimit,
});

export type BacktraceConfig = z.infer<typeof BacktraceConfigSchema>;

type EnvSource = Record<string, string | undefined>;

function resolveEnabled(env: EnvSource): boolean {
  const value = env[LIB_BACKTRACE_ENV_VAR] ?? env[BACKTRACE_ENV_VAR];
  if (value === undefined) {
    return false;
  }
  return !DISABLED_VALUES.has(value.trim().toLowerCase());
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Strictly parse backtrace settings from an environment map.
 * Throws ConfigError when a setting is present but invalid.
 */
export function parseBacktraceConfig(env: EnvSource): BacktraceConfig {
  const parsed = BacktraceEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid backtrace configuration: ${describeIssues(parsed.error)}`, {
      context: { module: 'config', operation: 'parseBacktraceConfig' },
      cause: parsed.error,
    });
  }

  return {
    enabled: resolveEnabled(env),
    frameLimit: parsed.data[BACKTRACE_LIMIT_ENV_VAR] ?? DEFAULT_FRAME_LIMIT,
  };
}

function loadFromEnvironment(): BacktraceConfig {
  try {
    return parseBacktraceConfig(process.env);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    currentLogger().logWarning(`${error.message}; using default frame limit`, {
      module: 'config',
      operation: 'loadBacktraceConfig',
    });
    return {
      enabled: resolveEnabled(process.env),
      frameLimit: DEFAULT_FRAME_LIMIT,
    };
  }
}

let cached: BacktraceConfig | null = null;

/**
 * Process-wide backtrace settings, read from the environment on first use.
 */
export function getBacktraceConfig(): BacktraceConfig {
  if (!cached) {
    cached = loadFromEnvironment();
  }
  return cached;
}

/**
 * Override the backtrace settings for the whole process. Passing `null`
 * drops overrides so the next read goes back to the environment. Overrides
 * are held to the same limits as the environment; invalid ones throw
 * ConfigError and leave the current settings in place.
 */
export function configureBacktrace(overrides: Partial<BacktraceConfig> | null): void {
  if (overrides === null) {
    cached = null;
    return;
  }
  const parsed = BacktraceConfigSchema.safeParse({
    ...getBacktraceConfig(),
    ...overrides,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid backtrace override: ${describeIssues(parsed.error)}`, {
      context: { module: 'config', operation: 'configureBacktrace' },
      cause: parsed.error,
    });
  }
  cached = parsed.data;
}

/**
 * Whether captured backtraces are currently enabled.
 */
export function isBacktraceEnabled(): boolean {
  return getBacktraceConfig().enabled;
}
