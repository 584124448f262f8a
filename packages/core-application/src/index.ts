// Public API of the core-application package: ports, value objects, the
// sync engine services and the Node/S3 adapters that back them.

// Ports (interfaces)
export * from "./ports/clock";
export type { Logger } from "./ports/logger";
export type { FileHash, FileHasher } from "./ports/file-hasher";
export type { ManifestStore } from "./ports/manifest-store";
export type { RemoteHead, RemoteListPage, RemoteStore } from "./ports/remote-store";
export type { FileCollector } from "./ports/file-collector";
export type { RetryContext, RetryPolicy, Sleeper } from "./ports/retry-policy";
export * from "./ports/file-event-observer";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Application
export * from "./application/errors";
export * from "./application/config";
export * from "./application/remote-keys";
export * from "./application/with-retry";
export * from "./application/default-network-retry-policy";
export * from "./application/create-sync-runtime";

// Value objects
export * from "./value-objects/candidate-failure";
export * from "./value-objects/upload-tally";

// Services
export * from "./services/manifest-tracker";
export * from "./services/change-detector";
export * from "./services/remote-inventory";
export * from "./services/hybrid-sync-planner";
export * from "./services/upload-executor";
export * from "./services/sync-service";
export * from "./services/sync-summary";
export * from "./services/watch-sync-scheduler";

// Node adapters
export * from "./adapters/console-logger";
export * from "./adapters/logging-file-observer";
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-manifest-store";
export * from "./adapters/node-file-collector";
export * from "./adapters/path-exclusions";
export * from "./adapters/s3-remote-store";
export * from "./adapters/chokidar-file-watcher";
