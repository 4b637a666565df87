/**
 * src/config/server.config.ts
 * Server configuration, read from the environment (and `.env`) and validated.
 */
import dotenv from 'dotenv';
import { join, resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_DOCUMENT } from '../core/httpParser';
import { DEFAULT_MAX_HEADER_BYTES } from '../core/requestReader';
import { LOG_LEVELS, LogLevel } from '../utils/logger';

// Load environment variables from .env file
dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7777),
  HOST: z.string().min(1).default('0.0.0.0'),
  ROOT_DIR: z.string().min(1).optional(),
  DEFAULT_DOCUMENT: z
    .string()
    .startsWith('/', { message: 'must start with /' })
    .refine((value) => value !== '/', { message: 'must name a file' })
    .default(DEFAULT_DOCUMENT),
  MAX_HEADER_BYTES: z.coerce.number().int().min(16).default(DEFAULT_MAX_HEADER_BYTES),
  HEADER_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_DIR: z.string().min(1).optional(),
  LOG_TO_FILE: booleanFlag.default('false'),
});

export interface ServerConfig {
  port: number;
  hostname: string;
  /** Directory request paths are resolved against. */
  rootDir: string;
  /** Document served for `/`. */
  defaultDocument: string;
  /** Capacity of the raw request buffer. */
  maxHeaderBytes: number;
  /** Header read timeout; 0 disables it. */
  headerTimeoutMs: number;
  logging: {
    level: LogLevel;
    logDir: string;
    toFile: boolean;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the server configuration from `env`.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    hostname: vars.HOST,
    rootDir: vars.ROOT_DIR ? resolve(process.cwd(), vars.ROOT_DIR) : process.cwd(),
    defaultDocument: vars.DEFAULT_DOCUMENT,
    maxHeaderBytes: vars.MAX_HEADER_BYTES,
    headerTimeoutMs: vars.HEADER_TIMEOUT_MS,
    logging: {
      level: vars.LOG_LEVEL,
      logDir: vars.LOG_DIR ? resolve(process.cwd(), vars.LOG_DIR) : join(process.cwd(), 'logs'),
      toFile: vars.LOG_TO_FILE,
    },
  };
}
