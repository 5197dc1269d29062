#!/usr/bin/env node
/**
 * CLI: Run a wait plan from stdin JSON → JSONL events on stdout.
 *
 * Usage: cat plan.json | run-waits [config/waits.json]
 *
 * Reads a wait plan, launches headless Chromium through Playwright, opens the
 * plan's URL and runs each wait in order. Progress is streamed as JSONL;
 * the wait log (waits.jsonl) and summary.md land in the run directory
 * (WAIT_RUN_DIR, or a fresh temp dir).
 */

import { chromium } from 'playwright';
import type { Browser } from 'playwright';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mkdir, mkdtemp } from 'node:fs/promises';

import { WaitPlanSchema } from '../schemas/index.js';
import { DEFAULT_WAIT_CONFIG, loadWaitConfig, resolveSessionTimeouts } from '../config/loader.js';
import { PlaywrightProbe } from '../engines/playwright-probe.js';
import { WaitLogger } from '../logging/wait-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { WaitMetricsCollector } from '../metrics/collector.js';
import { runWaitPlan } from '../runner/plan-runner.js';
import { WaitEngine } from '../wait/wait-engine.js';
import { messageOf } from '../exception/errors.js';
import type { WaitConfig, WaitPlan } from '../types/index.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function createRunDir(runId: string): Promise<string> {
  const root = process.env.WAIT_RUN_DIR;
  if (!root) return mkdtemp(join(tmpdir(), 'run-waits-'));
  const dir = join(root, runId);
  await mkdir(dir, { recursive: true });
  return dir;
}

async function readInputs(configPath: string | undefined): Promise<{ plan: WaitPlan; config: WaitConfig }> {
  const raw = await readStdin();
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON on stdin: ${messageOf(err)}`, { cause: err });
  }
  const parsed = WaitPlanSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'plan'}: ${issue.message}`);
    throw new Error(`Invalid wait plan: ${issues.join('; ')}`);
  }
  const config = configPath ? await loadWaitConfig(configPath) : DEFAULT_WAIT_CONFIG;
  return { plan: parsed.data, config };
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  // 1. Read plan from stdin, config from argv
  let inputs: { plan: WaitPlan; config: WaitConfig };
  try {
    inputs = await readInputs(process.argv[2]);
  } catch (err) {
    emit({ type: 'run_error', error: messageOf(err) });
    process.exitCode = 1;
    return;
  }
  const { plan, config } = inputs;

  const runId = `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
  const runDir = await createRunDir(runId);
  const logger = new WaitLogger(runDir);
  const metrics = new WaitMetricsCollector();
  const engine = new WaitEngine({ observers: [logger, metrics] });

  emit({ type: 'run_start', runId, totalWaits: plan.waits.length, runDir });

  // 2. Launch browser
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: process.env.HEADLESS !== 'false',
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
  } catch (err) {
    emit({ type: 'run_error', error: `Browser launch failed: ${messageOf(err)}` });
    process.exitCode = 1;
    return;
  }

  try {
    const page = await browser.newPage();
    const probe = new PlaywrightProbe(page, resolveSessionTimeouts(config, plan.session));
    if (plan.url) {
      await probe.goto(plan.url);
    }

    // 3. Run waits, logging each step result
    const result = await runWaitPlan(probe, plan, {
      engine,
      config,
      emit: (event) => emit({ ...event }),
    });
    for (const step of result.results) {
      await logger.logStep(step);
    }
    await writeSummary({ runDir, runId, url: plan.url, results: result.results, totalWaits: plan.waits.length });

    emit({
      type: 'run_complete',
      ok: result.ok,
      totalDurationMs: result.durationMs,
      ...(result.abortedAt ? { abortedAt: result.abortedAt } : {}),
      metrics: metrics.finalize(),
    });
    if (!result.ok) process.exitCode = 1;
  } catch (err) {
    emit({ type: 'run_error', error: messageOf(err) });
    process.exitCode = 1;
  } finally {
    await browser.close();
  }
}

main().catch((err: unknown) => {
  emit({ type: 'run_error', error: messageOf(err) });
  process.exitCode = 1;
});
