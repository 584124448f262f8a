import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "path";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { NullLogger } from "./console-logger";

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  constructor(private readonly logger: Logger = new NullLogger()) {}

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);

    this.watcher = chokidar.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 500,
        pollInterval: 100,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });

    const emit = (type: FileChangeType, filePath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(filePath),
        occurredAt: new Date(),
      });
    };

    this.watcher
      .on("add", (p: string) => emit("created", p))
      .on("change", (p: string) => emit("modified", p))
      .on("unlink", (p: string) => emit("deleted", p))
      .on("error", (err: unknown) => this.logger.error("File watcher error", err));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
