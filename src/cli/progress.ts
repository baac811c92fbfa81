/**
 * Tablesmith ProgressReporter
 *
 * Provides structured console output for CLI operations.
 */

import { ErrorHandler } from '../errors/index.js';

export class ProgressReporter {
  private lastStep = -1;

  constructor(private readonly stepPercent: number = 25) {}

  startTask(name: string): void {
    console.log(`⏳ ${name}...`);
  }

  completeTask(name: string): void {
    console.log(`✅ ${name}`);
  }

  failTask(name: string, err: unknown): void {
    console.error(`❌ ${name}: ${ErrorHandler.toUserMessage(err)}`);
  }

  /**
   * Log generation progress, once per `stepPercent` boundary crossed.
   * A fraction of 0 starts a new run.
   */
  logProgress(fraction: number): void {
    if (fraction === 0) {
      this.lastStep = -1;
      return;
    }
    const percent = Math.floor(fraction * 100);
    const step = Math.floor(percent / this.stepPercent);
    if (step <= this.lastStep) return;
    this.lastStep = step;
    console.log(`📊 ${percent}%`);
  }

  logInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }
}
