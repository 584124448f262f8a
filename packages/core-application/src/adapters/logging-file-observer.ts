import type { FileEventObserver, FileOutcome } from "../ports/file-event-observer";
import type { Logger } from "../ports/logger";
import { formatSize } from "../services/sync-summary";

export class LoggingFileObserver implements FileEventObserver {
  constructor(private readonly logger: Logger) {}

  onFileEvent(key: string, bytes: number, outcome: FileOutcome, error?: Error): void {
    switch (outcome) {
      case "uploaded":
        this.logger.debug(`  ✓ ${key} (${formatSize(bytes)})`);
        return;
      case "skipped":
        this.logger.debug(`  ⊘ ${key} unchanged`);
        return;
      case "failed":
        this.logger.error(`  ✗ Failed to upload ${key}: ${error?.message ?? "unknown error"}`);
        return;
    }
  }
}
