import type { Catalog } from "./catalog.js";
import { AbortedError } from "./errors.js";
import {
  cancelRefreshPath,
  isInProgress,
  latestRecord,
  startRefreshPath,
  type RefreshRecord,
  type Refreshable,
} from "./resources.js";
import type { HttpSession } from "./session.js";
import type { Clock, ClientConfig, JsonObject, RefreshOptions, WaitOptions } from "./types.js";
import { logDebug, logError, logInfo, throwIfAborted } from "./utils.js";

export type RefreshOutcome =
  | { kind: "skipped"; resource: Refreshable; current: RefreshRecord }
  | { kind: "started"; resource: Refreshable; submittedAt: Date; final: RefreshRecord | null }
  | {
      kind: "cancelledAndStarted";
      resource: Refreshable;
      cancelled: RefreshRecord;
      submittedAt: Date;
      final: RefreshRecord | null;
    };

export type CancelOutcome = {
  cancelled: boolean;
  record: RefreshRecord | null;
};

type Deadline = {
  signal?: AbortSignal;
  expiresAt: number | null;
  dispose: () => void;
};

function describe(resource: Refreshable): JsonObject {
  return { kind: resource.kind, id: resource.id, name: resource.name, groupId: resource.groupId };
}

/**
 * Starts, cancels and watches refreshes. Holds no state between calls: every
 * decision is re-derived from the resource's refresh history.
 */
export class RefreshOrchestrator {
  constructor(
    private readonly http: HttpSession,
    private readonly catalog: Catalog,
    private readonly config: ClientConfig,
    private readonly clock: Clock,
  ) {}

  async getLastRefresh(resource: Refreshable, signal?: AbortSignal): Promise<RefreshRecord | null> {
    return latestRecord(await this.catalog.refreshHistory(resource, signal));
  }

  async refresh(resource: Refreshable, options: RefreshOptions = {}): Promise<RefreshOutcome> {
    const deadline = this.startDeadline(options);
    try {
      const last = await this.getLastRefresh(resource, deadline.signal);
      let cancelled: RefreshRecord | null = null;

      if (last && isInProgress(last)) {
        if (!options.force) {
          logInfo("pbi.refresh.skipped", { ...describe(resource), inProgressId: last.id });
          return { kind: "skipped", resource, current: last };
        }
        await this.cancelRecord(last, deadline.signal);
        cancelled = last;
        await this.clock.sleep(this.config.settleDelayMs, deadline.signal);
      }

      const submittedAt = await this.submit(resource, options.refreshType, deadline.signal);
      const final = options.waitUntilComplete ? await this.poll(resource, submittedAt, deadline) : null;

      if (cancelled) return { kind: "cancelledAndStarted", resource, cancelled, submittedAt, final };
      return { kind: "started", resource, submittedAt, final };
    } finally {
      deadline.dispose();
    }
  }

  /** Fans out over several resources; one failure does not stop the others. */
  refreshMany(
    resources: Refreshable[],
    options: RefreshOptions = {},
  ): Promise<PromiseSettledResult<RefreshOutcome>[]> {
    return Promise.allSettled(resources.map((r) => this.refresh(r, options)));
  }

  async cancel(resource: Refreshable, signal?: AbortSignal): Promise<CancelOutcome> {
    const last = await this.getLastRefresh(resource, signal);
    if (!last || !isInProgress(last)) {
      logError("pbi.refresh.cancel.nothingInProgress", {
        ...describe(resource),
        lastId: last?.id ?? null,
        lastStatus: last?.status ?? null,
      });
      return { cancelled: false, record: last };
    }
    await this.cancelRecord(last, signal);
    return { cancelled: true, record: last };
  }

  /**
   * Polls until the first refresh that started after `since` leaves InProgress.
   * A refresh that has not shown up in the history yet counts as still running.
   */
  async waitUntilComplete(resource: Refreshable, since: Date, options: WaitOptions = {}): Promise<RefreshRecord> {
    const deadline = this.startDeadline(options);
    try {
      return await this.poll(resource, since, deadline);
    } finally {
      deadline.dispose();
    }
  }

  private async submit(resource: Refreshable, refreshType: string | undefined, signal?: AbortSignal): Promise<Date> {
    const body = resource.kind === "dataset" ? { retryCount: 3, type: refreshType ?? "Full" } : {};
    const submittedAt = new Date(this.clock.now());
    await this.http.post(startRefreshPath(resource), {
      body,
      policies: [this.http.conflict],
      signal,
    });
    logInfo("pbi.refresh.submitted", { ...describe(resource), submittedAt: submittedAt.toISOString() });
    return submittedAt;
  }

  private async cancelRecord(record: RefreshRecord, signal?: AbortSignal): Promise<void> {
    const path = cancelRefreshPath(record);
    if (record.kind === "refresh") await this.http.delete(path, { signal });
    else await this.http.post(path, { signal });
    logInfo("pbi.refresh.cancelled", { recordKind: record.kind, id: record.id, groupId: record.groupId });
  }

  private async poll(resource: Refreshable, since: Date, deadline: Deadline): Promise<RefreshRecord> {
    await this.pause(this.config.pollInitialDelayMs, deadline);

    for (let round = 1; ; round++) {
      this.checkDeadline(resource, deadline);
      const history = await this.catalog.refreshHistory(resource, deadline.signal);
      const current = history.find((r) => r.startTime.getTime() > since.getTime());

      if (current && !isInProgress(current)) {
        logInfo("pbi.refresh.completed", {
          ...describe(resource),
          id: current.id,
          status: current.status,
          durationMs: current.durationMs,
        });
        return current;
      }

      logDebug("pbi.refresh.poll", {
        ...describe(resource),
        round,
        visible: current !== undefined,
        nextPollMs: this.config.pollIntervalMs,
      });
      await this.pause(this.config.pollIntervalMs, deadline);
    }
  }

  private async pause(ms: number, deadline: Deadline): Promise<void> {
    const remaining = deadline.expiresAt === null ? ms : Math.max(0, deadline.expiresAt - this.clock.now());
    await this.clock.sleep(Math.min(ms, remaining), deadline.signal);
  }

  private checkDeadline(resource: Refreshable, deadline: Deadline): void {
    throwIfAborted(deadline.signal);
    if (deadline.expiresAt !== null && this.clock.now() >= deadline.expiresAt) {
      throw new AbortedError(`Timed out waiting for ${resource.kind} '${resource.name}' to finish refreshing.`);
    }
  }

  private startDeadline(options: WaitOptions): Deadline {
    const { timeoutMs, signal } = options;
    if (timeoutMs === undefined) return { signal, expiresAt: null, dispose: () => undefined };

    const controller = new AbortController();
    const forward = () => controller.abort(signal?.reason);
    if (signal?.aborted) forward();
    else signal?.addEventListener("abort", forward, { once: true });

    const timer = setTimeout(() => {
      controller.abort(new AbortedError(`Timed out after ${timeoutMs}ms.`));
    }, timeoutMs);
    timer.unref();

    return {
      signal: controller.signal,
      expiresAt: this.clock.now() + timeoutMs,
      dispose: () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", forward);
      },
    };
  }
}
