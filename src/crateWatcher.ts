/**
 * @fileoverview CrateWatcher - Event-based crate folder watcher.
 * Polls the crate folder and regenerates the XML whenever a crate is added,
 * removed or modified.
 */

import EventEmitter from 'node:events';
import type { Converter } from './converter.js';
import { logSummary } from './converter.js';
import { silentLogger, type Logger } from './logger.js';
import { snapshotsEqual } from './snapshot.js';
import type { ConversionSummary, CrateSnapshot, TypedEmitter } from './types.js';

/**
 * Options for CrateWatcher
 */
export interface CrateWatcherOptions {
  /** How frequently to poll the crate folder (ms). Default: 30000 */
  pollIntervalMs?: number;
  /** Called with the summary of every conversion the watcher runs */
  onSummary?: (summary: ConversionSummary) => void;
  /** Receives progress messages. Default: silent */
  logger?: Logger;
}

/**
 * CrateWatcher polls a crate folder and re-runs a Converter when the crates
 * change.
 *
 * Polls never overlap: the next one is scheduled only after the previous
 * conversion finished. Errors are emitted as `error` events and polling
 * continues; the failed run is retried on the next poll.
 */
export class CrateWatcher extends (EventEmitter as new () => TypedEmitter) {
  private readonly pollIntervalMs: number;
  private readonly onSummary?: (summary: ConversionSummary) => void;
  private readonly logger: Logger;
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private lastSnapshot: CrateSnapshot | null = null;
  private isRunning: boolean = false;
  // Bumped by start() and stop(); a poll chain from an older generation ends.
  private generation: number = 0;
  // Settles when the most recently queued poll has finished.
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly converter: Converter,
    options: CrateWatcherOptions = {}
  ) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? 30_000;
    this.onSummary = options.onSummary;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start watching. Converts immediately, then polls until {@link stop}.
   *
   * A poll still running from before an earlier {@link stop} finishes first.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    const generation = ++this.generation;

    await this.pending;
    if (generation !== this.generation) {
      return;
    }

    this.lastSnapshot = null;
    this.emit('ready', {
      crateRoot: this.converter.crateRoot,
      output: this.converter.output,
    });

    await this.check();
    this.schedule(generation);
  }

  /**
   * Stop watching. A conversion in progress finishes, but nothing new starts.
   */
  stop(): void {
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }

    this.isRunning = false;
    this.generation++;
  }

  /**
   * Check if currently running
   */
  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Run one poll: snapshot the crates and convert if anything changed.
   *
   * Polls are queued; a call made while another poll runs starts after it.
   *
   * @returns The conversion summary, or null when nothing changed or the run
   *   failed
   */
  check(): Promise<ConversionSummary | null> {
    const run = this.pending.then(() => this.poll());
    this.pending = run.then(() => undefined);
    return run;
  }

  /**
   * Never rejects: failures are reported through {@link reportError}.
   */
  private async poll(): Promise<ConversionSummary | null> {
    try {
      this.emit('poll');

      const snapshot = await this.converter.computeSnapshot();
      if (this.lastSnapshot && snapshotsEqual(snapshot, this.lastSnapshot)) {
        this.emit('unchanged');
        return null;
      }

      const summary = await this.converter.runOnce();
      this.lastSnapshot = snapshot;

      this.logger.info(`Wrote ${summary.output}`);
      logSummary(summary, this.logger);
      this.onSummary?.(summary);
      this.emit('conversion', summary);
      return summary;
    } catch (err) {
      this.reportError(err instanceof Error ? err : new Error(String(err)));
      return null;
    }
  }

  private schedule(generation: number): void {
    if (!this.isRunning || generation !== this.generation) {
      return;
    }

    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      void this.check().then(() => this.schedule(generation));
    }, this.pollIntervalMs);
  }

  /**
   * Emit `error` when someone listens; otherwise log it so an unhandled
   * `error` event cannot crash the poll loop.
   */
  private reportError(err: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    } else {
      this.logger.error(err.message);
    }
  }
}
