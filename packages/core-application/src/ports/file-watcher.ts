export type FileChangeType = "created" | "modified" | "deleted";

export type FileChangeEvent = {
  type: FileChangeType;
  /** Absolute path of the changed file. */
  path: string;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  rootDir: string;
  ignore: (absolutePath: string) => boolean;
};

export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: FileChangeEvent) => void): void;
}
