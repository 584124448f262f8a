import type { FileChangeEvent, FileWatcher } from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { NullLogger } from "../adapters/console-logger";
import { describeError } from "../application/errors";

export const DEFAULT_WATCH_DEBOUNCE_MS = 2000;

export type WatchSyncSchedulerOptions = {
  watcher: FileWatcher;
  rootDir: string;
  ignore: (absolutePath: string) => boolean;
  runSync: () => Promise<void>;
  debounceMs?: number;
  logger?: Logger;
};

/**
 * Turns bursts of file events into sync runs. Runs never overlap: events
 * that arrive while a run is in progress queue exactly one follow-up run.
 */
export class WatchSyncScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private pending = false;
  private stopped = false;
  private readonly logger: Logger;

  constructor(private readonly options: WatchSyncSchedulerOptions) {
    this.logger = options.logger ?? new NullLogger();
  }

  async start(): Promise<void> {
    this.stopped = false;
    this.options.watcher.onEvent((e) => this.onChange(e));
    await this.options.watcher.start({ rootDir: this.options.rootDir, ignore: this.options.ignore });
    this.logger.info(`Watching: ${this.options.rootDir}`);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.pending = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.options.watcher.stop();
    await this.idle();
  }

  /** Resolves once no run is in progress. */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  /** Starts a run now, or queues one if a run is already going. */
  trigger(): void {
    if (this.stopped) return;
    if (this.running) {
      this.pending = true;
      return;
    }

    this.running = this.options
      .runSync()
      .catch((err) => {
        this.logger.error(`Sync run failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.running = null;
        if (this.pending) {
          this.pending = false;
          this.trigger();
        }
      });
  }

  private onChange(event: FileChangeEvent): void {
    if (this.stopped) return;
    this.logger.debug(`${event.type}: ${event.path}`);

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.trigger();
    }, this.options.debounceMs ?? DEFAULT_WATCH_DEBOUNCE_MS);
  }
}
