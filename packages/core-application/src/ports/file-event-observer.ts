export type FileOutcome = "uploaded" | "failed" | "skipped";

/** Per-file progress hook injected by the caller. */
export interface FileEventObserver {
  onFileEvent(key: string, bytes: number, outcome: FileOutcome, error?: Error): void;
}

export const noopFileEventObserver: FileEventObserver = {
  onFileEvent() {},
};
