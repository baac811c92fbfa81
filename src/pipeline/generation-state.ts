/**
 * Generation State
 *
 * Observable (isLoading, progress) pair for one exporter. Readers subscribe
 * through `ReadonlyGenerationState`; only the owning exporter mutates.
 */

import { EventEmitter } from 'events';

export type Unsubscribe = () => void;

export interface ReadonlyGenerationState {
  readonly isLoading: boolean;
  /** Completed fraction of the current (or last) generation, in [0, 1]. */
  readonly progress: number;
  /** Called with the current value immediately, then on every change. */
  onLoadingChange(listener: (isLoading: boolean) => void): Unsubscribe;
  /** Called with the current value immediately, then on every change. */
  onProgress(listener: (progress: number) => void): Unsubscribe;
}

export class GenerationState implements ReadonlyGenerationState {
  private readonly emitter = new EventEmitter();
  private loading = false;
  private fraction = 0;

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  get isLoading(): boolean {
    return this.loading;
  }

  get progress(): number {
    return this.fraction;
  }

  onLoadingChange(listener: (isLoading: boolean) => void): Unsubscribe {
    listener(this.loading);
    this.emitter.on('loading', listener);
    return () => {
      this.emitter.off('loading', listener);
    };
  }

  onProgress(listener: (progress: number) => void): Unsubscribe {
    listener(this.fraction);
    this.emitter.on('progress', listener);
    return () => {
      this.emitter.off('progress', listener);
    };
  }

  /** Enter Generating: (true, 0). */
  begin(): void {
    this.setLoading(true);
    this.setProgress(0);
  }

  /** Back to Idle; progress keeps its last value. */
  finish(): void {
    this.setLoading(false);
  }

  /** Clamp to [current, 1] so progress never moves backwards within a run. */
  report(fraction: number): void {
    if (!this.loading || Number.isNaN(fraction)) return;
    this.setProgress(Math.min(1, Math.max(this.fraction, fraction)));
  }

  private setLoading(value: boolean): void {
    if (this.loading === value) return;
    this.loading = value;
    this.emitter.emit('loading', value);
  }

  private setProgress(value: number): void {
    if (this.fraction === value) return;
    this.fraction = value;
    this.emitter.emit('progress', value);
  }
}
