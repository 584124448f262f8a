/** Persisted manifest exists but cannot be parsed. Fatal: the user must fix or delete it. */
export class ManifestCorruptError extends Error {
  constructor(message: string, public readonly manifestPath: string, public cause?: unknown) {
    super(message);
    this.name = "ManifestCorruptError";
  }
}

/** Local read/write failure. Fatal for the file involved, not for the run. */
export class LocalIoError extends Error {
  constructor(message: string, public readonly path: string, public cause?: unknown) {
    super(message);
    this.name = "LocalIoError";
  }
}

/** Listing, auth or transport failure against the remote store. Aborts planning. */
export class RemoteUnavailableError extends Error {
  constructor(message: string, public statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteUnavailableError";
  }
}

export class UploadFailedError extends Error {
  constructor(message: string, public readonly remoteKey: string, public cause?: unknown) {
    super(message);
    this.name = "UploadFailedError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/** Reads `$metadata.httpStatusCode` (AWS SDK errors) or `statusCode` without trusting the shape. */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (err instanceof RemoteUnavailableError) return err.statusCode;
  if ("$metadata" in err) {
    const meta = err.$metadata;
    if (typeof meta === "object" && meta !== null && "httpStatusCode" in meta) {
      return typeof meta.httpStatusCode === "number" ? meta.httpStatusCode : undefined;
    }
  }
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}
