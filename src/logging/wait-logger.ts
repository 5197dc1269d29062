import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { WaitEvent, WaitObserver, WaitStepResult } from '../types/index.js';

export interface WaitLoggerOptions {
  /** Also log every individual attempt, not just how each wait ended. */
  includeAttempts?: boolean;
}

export class WaitLogger implements WaitObserver {
  private logPath: string;
  private initialized = false;

  constructor(
    private runDir: string,
    private options: WaitLoggerOptions = {},
  ) {
    this.logPath = join(runDir, 'waits.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  private async append(entry: Record<string, unknown>): Promise<void> {
    await this.ensureDir();
    await appendFile(this.logPath, JSON.stringify({ timestamp: new Date().toISOString(), ...entry }) + '\n', 'utf-8');
  }

  async record(event: WaitEvent): Promise<void> {
    if (event.type === 'wait_attempt' && !this.options.includeAttempts) return;
    await this.append({ ...event });
  }

  async logStep(result: WaitStepResult): Promise<void> {
    await this.append({ type: 'wait_step', ...result });
  }

  getRunDir(): string {
    return this.runDir;
  }

  getLogPath(): string {
    return this.logPath;
  }
}
