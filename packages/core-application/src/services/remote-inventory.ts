import type { RemoteObjectInfo } from "@mirror-sync/core-domain";

import type { RemoteListPage, RemoteStore } from "../ports/remote-store";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { Logger } from "../ports/logger";
import { NullLogger } from "../adapters/console-logger";
import { RemoteUnavailableError, describeError, httpStatusOf } from "../application/errors";
import { withRetry } from "../application/with-retry";
import { defaultNetworkRetryPolicy } from "../application/default-network-retry-policy";
import { sleep as defaultSleep } from "../infra/sleep";

export type RemoteInventoryDeps = {
  store: RemoteStore;
  retryPolicy?: RetryPolicy;
  sleep?: Sleeper;
  logger?: Logger;
};

export class RemoteInventory {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;

  constructor(private readonly deps: RemoteInventoryDeps) {
    this.retryPolicy = deps.retryPolicy ?? defaultNetworkRetryPolicy();
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? new NullLogger();
  }

  /**
   * Snapshot of every object under `prefix`. Pages are fetched one at a
   * time until the store stops returning a continuation token.
   */
  async listAll(prefix: string): Promise<Map<string, RemoteObjectInfo>> {
    const objects = new Map<string, RemoteObjectInfo>();
    let token: string | null = null;
    let pages = 0;

    do {
      const page = await this.fetchPage(prefix, token);
      pages++;

      for (const obj of page.objects) {
        if (obj.remoteKey.endsWith("/")) continue; // directory placeholders
        objects.set(obj.remoteKey, obj);
      }

      token = page.nextToken;
    } while (token);

    this.logger.debug(
      `Remote inventory: ${objects.size} objects under "${prefix || "(root)"}" in ${pages} page(s)`
    );
    return objects;
  }

  private async fetchPage(prefix: string, token: string | null): Promise<RemoteListPage> {
    try {
      return await withRetry(
        () => this.deps.store.listPage(prefix, token),
        this.retryPolicy,
        this.sleep
      );
    } catch (err) {
      if (err instanceof RemoteUnavailableError) throw err;
      throw new RemoteUnavailableError(
        `Failed to list remote objects under "${prefix || "(root)"}": ${describeError(err)}`,
        httpStatusOf(err),
        err
      );
    }
  }
}
