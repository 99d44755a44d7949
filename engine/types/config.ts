/**
 * Engine configuration
 *
 * Precedence: explicit executor options, then the runbook's `config` block,
 * then DEFAULT_EXECUTION_CONFIG. `loadEngineConfig` turns ORCHESTRATOR_* env
 * vars into executor options.
 */

import { z } from "zod";
import type { RunbookConfig } from "../../shared/types/runbook.js";
import { ConfigError } from "../utils/errorTypes.js";

export interface ExecutionConfig {
  /** Maximum artifacts produced concurrently */
  maxConcurrency: number;
  /** Per-artifact timeout; undefined means no limit */
  stepTimeoutMs: number | undefined;
  /** Whole-run timeout */
  runTimeoutMs: number;
  /** Maximum nesting depth of child runbooks */
  maxChildDepth: number;
}

export interface EngineConfig extends Partial<ExecutionConfig> {
  /** Base directory for the filesystem artifact store */
  storeDir?: string;
}

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = {
  maxConcurrency: 10,
  stepTimeoutMs: undefined,
  runTimeoutMs: 300_000,
  maxChildDepth: 3,
};

const positiveInt = z
  .string()
  .trim()
  .regex(/^\d+$/, "must be a positive integer")
  .transform(Number)
  .pipe(z.number().int().positive());

const EngineEnvSchema = z.object({
  ORCHESTRATOR_MAX_CONCURRENCY: positiveInt.optional(),
  ORCHESTRATOR_STEP_TIMEOUT_MS: positiveInt.optional(),
  ORCHESTRATOR_RUN_TIMEOUT_MS: positiveInt.optional(),
  ORCHESTRATOR_STORE_DIR: z.string().min(1).optional(),
});

/**
 * Read engine settings from environment variables. Unset variables are left
 * out so they do not shadow runbook configuration.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = EngineEnvSchema.safeParse({
    ORCHESTRATOR_MAX_CONCURRENCY: env.ORCHESTRATOR_MAX_CONCURRENCY || undefined,
    ORCHESTRATOR_STEP_TIMEOUT_MS: env.ORCHESTRATOR_STEP_TIMEOUT_MS || undefined,
    ORCHESTRATOR_RUN_TIMEOUT_MS: env.ORCHESTRATOR_RUN_TIMEOUT_MS || undefined,
    ORCHESTRATOR_STORE_DIR: env.ORCHESTRATOR_STORE_DIR || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid engine configuration: ${issues.join("; ")}`, { issues });
  }

  const parsed = result.data;
  const config: EngineConfig = {};
  if (parsed.ORCHESTRATOR_MAX_CONCURRENCY !== undefined) {
    config.maxConcurrency = parsed.ORCHESTRATOR_MAX_CONCURRENCY;
  }
  if (parsed.ORCHESTRATOR_STEP_TIMEOUT_MS !== undefined) {
    config.stepTimeoutMs = parsed.ORCHESTRATOR_STEP_TIMEOUT_MS;
  }
  if (parsed.ORCHESTRATOR_RUN_TIMEOUT_MS !== undefined) {
    config.runTimeoutMs = parsed.ORCHESTRATOR_RUN_TIMEOUT_MS;
  }
  if (parsed.ORCHESTRATOR_STORE_DIR !== undefined) {
    config.storeDir = parsed.ORCHESTRATOR_STORE_DIR;
  }
  return config;
}

export function resolveExecutionConfig(
  runbookConfig: RunbookConfig | undefined,
  overrides: Partial<ExecutionConfig> = {}
): ExecutionConfig {
  const fromRunbook: Partial<ExecutionConfig> = runbookConfig
    ? {
        maxConcurrency: runbookConfig.max_concurrency,
        stepTimeoutMs:
          runbookConfig.step_timeout !== undefined ? runbookConfig.step_timeout * 1000 : undefined,
        runTimeoutMs: runbookConfig.timeout * 1000,
        maxChildDepth: runbookConfig.max_child_depth,
      }
    : {};

  return {
    maxConcurrency:
      overrides.maxConcurrency ?? fromRunbook.maxConcurrency ?? DEFAULT_EXECUTION_CONFIG.maxConcurrency,
    stepTimeoutMs:
      overrides.stepTimeoutMs ?? fromRunbook.stepTimeoutMs ?? DEFAULT_EXECUTION_CONFIG.stepTimeoutMs,
    runTimeoutMs:
      overrides.runTimeoutMs ?? fromRunbook.runTimeoutMs ?? DEFAULT_EXECUTION_CONFIG.runTimeoutMs,
    maxChildDepth:
      overrides.maxChildDepth ?? fromRunbook.maxChildDepth ?? DEFAULT_EXECUTION_CONFIG.maxChildDepth,
  };
}
