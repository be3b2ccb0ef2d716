import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, PlannerConfigSchema } from '@itinera/agent-contracts';
import { loadPlannerConfig, mergeConfig, resolvePlannerConfig } from '../config.js';

const EXAMPLE = fileURLToPath(new URL('../../config/planner.example.yaml', import.meta.url));

describe('mergeConfig', () => {
  it('merges nested objects key by key', () => {
    expect(mergeConfig({ optimizer: { maxIterations: 5, autoApprove: false } }, { optimizer: { autoApprove: true } })).toEqual({
      optimizer: { maxIterations: 5, autoApprove: true },
    });
  });

  it('replaces arrays and scalars', () => {
    expect(mergeConfig({ ranking: ['a', 'b'], logLevel: 'info' }, { ranking: ['c'], logLevel: 'debug' })).toEqual({
      ranking: ['c'],
      logLevel: 'debug',
    });
  });

  it('keeps the base when the override is undefined', () => {
    expect(mergeConfig({ a: 1 }, undefined)).toEqual({ a: 1 });
  });
});

describe('resolvePlannerConfig', () => {
  it('fills in every default', () => {
    const config = resolvePlannerConfig();

    expect(config.budget).toEqual({ tooLowRatio: 1.5, excessRatio: 2 });
    expect(config.optimizer.maxIterations).toBe(5);
    expect(config.optimizer.ranking[0]).toBe('shorter_stay');
    expect(config.costs.fallback.flights).toBe(800);
    expect(config.checkpoints.suggestions).toBe(true);
    expect(config.workerTimeoutMs).toBe(10_000);
  });

  it('applies overrides on top of the raw configuration', () => {
    const config = resolvePlannerConfig({ optimizer: { maxIterations: 3 } }, { optimizer: { autoApprove: true } });

    expect(config.optimizer.maxIterations).toBe(3);
    expect(config.optimizer.autoApprove).toBe(true);
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      resolvePlannerConfig({ optimizer: { maxIterations: 0 }, logLevel: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: 'INVALID_CONFIG' });
    const issues = caught instanceof ConfigError ? caught.details?.issues : undefined;
    expect(issues).toEqual([
      { path: 'optimizer.maxIterations', message: 'Number must be greater than 0' },
      { path: 'logLevel', message: expect.stringContaining('Invalid enum value') },
    ]);
  });

  it('rejects duplicate strategies in the ranking', () => {
    expect(() => resolvePlannerConfig({ optimizer: { ranking: ['remove_car', 'remove_car'] } })).toThrow(
      'optimizer.ranking: Strategy ranking contains duplicates',
    );
  });
});

describe('loadPlannerConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'itinera-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the bundled example as the defaults', async () => {
    const config = await loadPlannerConfig(EXAMPLE);
    expect(config).toEqual(PlannerConfigSchema.parse({}));
  });

  it('reads a partial file and applies overrides', async () => {
    const path = join(dir, 'planner.yaml');
    await writeFile(path, 'optimizer:\n  autoApprove: true\ncheckpoints:\n  suggestions: false\n');

    const config = await loadPlannerConfig(path, { logLevel: 'debug' });

    expect(config.optimizer.autoApprove).toBe(true);
    expect(config.checkpoints.suggestions).toBe(false);
    expect(config.logLevel).toBe('debug');
  });

  it('treats an empty file as all defaults', async () => {
    const path = join(dir, 'empty.yaml');
    await writeFile(path, '');

    expect(await loadPlannerConfig(path)).toEqual(PlannerConfigSchema.parse({}));
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'missing.yaml');
    await expect(loadPlannerConfig(path)).rejects.toThrow(`INVALID_CONFIG: Cannot read planner configuration at ${path}`);
  });

  it('reports invalid YAML', async () => {
    const path = join(dir, 'broken.yaml');
    await writeFile(path, 'optimizer: [unclosed\n');

    await expect(loadPlannerConfig(path)).rejects.toThrow(
      `INVALID_CONFIG: Planner configuration at ${path} is not valid YAML`,
    );
  });
});
