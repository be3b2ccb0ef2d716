/**
 * Planner configuration: YAML file plus programmatic overrides, validated
 * with PlannerConfigSchema.
 *
 * @example
 * ```yaml
 * budget:
 *   tooLowRatio: 1.5
 * optimizer:
 *   maxIterations: 3
 *   autoApprove: true
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import { ConfigError, PlannerConfigSchema, errorMessage } from '@itinera/agent-contracts';
import type { PlannerConfig, PlannerConfigInput } from '@itinera/agent-contracts';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`. Objects merge key by key; arrays and
 * scalars replace.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

/**
 * Validate a raw configuration and fill in defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolvePlannerConfig(raw: unknown = {}, overrides: PlannerConfigInput = {}): PlannerConfig {
  const result = PlannerConfigSchema.safeParse(mergeConfig(raw ?? {}, overrides));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  • ${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid planner configuration:\n${issues.join('\n')}`, {
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return result.data;
}

/**
 * Read a YAML configuration file.
 *
 * @throws ConfigError when the file cannot be read, is not YAML, or fails validation
 */
export async function loadPlannerConfig(path: string, overrides: PlannerConfigInput = {}): Promise<PlannerConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read planner configuration at ${path}`, { cause: errorMessage(error) });
  }

  let raw: unknown;
  try {
    raw = parseYAML(content);
  } catch (error) {
    throw new ConfigError(`Planner configuration at ${path} is not valid YAML`, { cause: errorMessage(error) });
  }

  return resolvePlannerConfig(raw, overrides);
}
