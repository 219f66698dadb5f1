import { z } from 'zod';
import { CastError } from './errors/index.js';
import { Logger } from './logging/logger.js';
import { logFormatSchema, logLevelSchema } from './validation/index.js';

export const DEFAULT_RELABEL_MAX_DEPTH = 4096;

const envSchema = z.object({
  SHAPECAST_LOG_LEVEL: logLevelSchema.default('warn'),
  SHAPECAST_LOG_FORMAT: logFormatSchema.default('text'),
  SHAPECAST_RELABEL_MAX_DEPTH: z.coerce
    .number()
    .int()
    .min(1)
    .max(1_000_000)
    .default(DEFAULT_RELABEL_MAX_DEPTH),
});

export interface ShapecastConfig {
  logging: {
    level: z.infer<typeof logLevelSchema>;
    format: z.infer<typeof logFormatSchema>;
  };
  relabel: {
    /** Deepest nesting the relabeler will decode */
    maxDepth: number;
  };
}

export function formatZodError(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/** Treat empty variables as unset so `FOO=` falls back to the default */
function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

/**
 * Read shapecast settings from environment variables
 * @throws CastError CONFIGURATION_ERROR when a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ShapecastConfig {
  const result = envSchema.safeParse(definedOnly(env));
  if (!result.success) {
    throw new CastError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodError('Invalid shapecast environment', result.error),
      suggestion: 'Fix or unset the SHAPECAST_* variables listed above',
    });
  }

  return {
    logging: {
      level: result.data.SHAPECAST_LOG_LEVEL,
      format: result.data.SHAPECAST_LOG_FORMAT,
    },
    relabel: {
      maxDepth: result.data.SHAPECAST_RELABEL_MAX_DEPTH,
    },
  };
}

let defaultConfig: ShapecastConfig | undefined;
let defaultLogger: Logger | undefined;

/** Configuration read once from the process environment */
export function getDefaultConfig(): ShapecastConfig {
  defaultConfig ??= loadConfig();
  return defaultConfig;
}

/** Logger used when a caller passes none */
export function getDefaultLogger(): Logger {
  defaultLogger ??= new Logger(getDefaultConfig().logging);
  return defaultLogger;
}
