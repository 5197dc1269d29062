import { readFile } from 'node:fs/promises';
import type { SessionTimeouts, WaitConfig, WaitSpec, WaitSpecInput, WaitSpecOverrides } from '../types/index.js';
import { WaitConfigSchema } from '../schemas/index.js';
import { ConfigurationError, messageOf } from '../exception/errors.js';
import { DEFAULT_SESSION_TIMEOUTS } from '../engines/playwright-probe.js';
import { DEFAULT_POLL_INTERVAL_MS, createWaitSpec } from '../wait/wait-spec.js';

export const DEFAULT_WAIT_CONFIG: WaitConfig = {
  defaults: { timeoutMs: 10_000, pollIntervalMs: DEFAULT_POLL_INTERVAL_MS },
  profiles: {},
  session: DEFAULT_SESSION_TIMEOUTS,
};

export async function loadWaitConfig(path: string): Promise<WaitConfig> {
  const raw = await readFile(path, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Wait config ${path} is not valid JSON: ${messageOf(error)}`);
  }
  return parseWaitConfig(json, path);
}

export function parseWaitConfig(input: unknown, source = 'wait config'): WaitConfig {
  const parsed = WaitConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function definedOverrides(overrides: WaitSpecOverrides): WaitSpecOverrides {
  const result: WaitSpecOverrides = {};
  if (overrides.timeoutMs !== undefined) result.timeoutMs = overrides.timeoutMs;
  if (overrides.pollIntervalMs !== undefined) result.pollIntervalMs = overrides.pollIntervalMs;
  if (overrides.ignoring !== undefined) result.ignoring = overrides.ignoring;
  if (overrides.message !== undefined) result.message = overrides.message;
  return result;
}

/**
 * Layer config defaults, then the named profile, then each override in
 * order. Later layers win field by field.
 */
export function resolveWaitSpec(
  config: WaitConfig,
  profile?: string,
  ...overrides: Array<WaitSpecOverrides | undefined>
): WaitSpec {
  let merged: WaitSpecInput = { ...config.defaults };

  if (profile !== undefined) {
    const profileOverrides = config.profiles[profile];
    if (!profileOverrides) {
      throw new ConfigurationError(`Unknown wait profile "${profile}"`);
    }
    merged = { ...merged, ...definedOverrides(profileOverrides) };
  }

  for (const layer of overrides) {
    if (layer) merged = { ...merged, ...definedOverrides(layer) };
  }

  return createWaitSpec(merged);
}

export function resolveSessionTimeouts(
  config: WaitConfig,
  override: Partial<SessionTimeouts> = {},
): SessionTimeouts {
  return {
    implicitWaitMs: override.implicitWaitMs ?? config.session.implicitWaitMs,
    pageLoadMs: override.pageLoadMs ?? config.session.pageLoadMs,
  };
}
