/**
 * Model Store: owns the published registry generation.
 *
 * A generation (snapshot + the settings it was built with) is replaced by a
 * single assignment, so a decision holding one never sees a mix of two.
 */

import { DiscoveryUnavailableError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { buildSnapshot, emptySnapshot } from "../router/registry.js";
import type { Generation, RoutingSettings } from "../router/types.js";
import type { ModelDiscovery } from "../types.js";

export type RefreshResult = {
    generation: number;
    models: number;
    /** Discovery failed; the result reflects the last good model list */
    degraded: boolean;
    error: string | null;
};

export type StoreHealth = {
    status: "ok" | "degraded";
    generation: number;
    models: number;
    lastRefreshAt: number | null;
    lastError: string | null;
    /** Models tiered from the default parameter count */
    unparsedModels: string[];
};

export class ModelStore {
    private published: Generation;
    private rawModels: string[] = [];
    private nextId = 1;
    /** Tail of the rebuild queue; rebuilds run one at a time in call order */
    private queue: Promise<unknown> = Promise.resolve();
    private pendingRefresh: Promise<RefreshResult> | null = null;
    private timer: NodeJS.Timeout | null = null;
    private lastError: string | null = null;
    private lastRefreshAt: number | null = null;

    constructor(
        private readonly discovery: ModelDiscovery,
        settings: RoutingSettings,
    ) {
        this.published = Object.freeze({ id: 0, settings, snapshot: emptySnapshot(0) });
    }

    /** The generation every new decision should read */
    current(): Generation {
        return this.published;
    }

    /**
     * Re-fetch the model list and rebuild with the current settings.
     * Concurrent callers share one pending refresh.
     */
    refresh(): Promise<RefreshResult> {
        if (!this.pendingRefresh) {
            const pending: Promise<RefreshResult> = this.enqueue(() => this.rebuild(null)).finally(() => {
                if (this.pendingRefresh === pending) this.pendingRefresh = null;
            });
            this.pendingRefresh = pending;
        }
        return this.pendingRefresh;
    }

    /**
     * Swap in new settings (thresholds, filters, overrides) and rebuild.
     * Reloads apply in call order, so the last one called is the one published.
     * When discovery is down the last good model list is re-tiered instead.
     */
    reload(settings: RoutingSettings): Promise<RefreshResult> {
        return this.enqueue(() => this.rebuild(settings));
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // The caller gets the failure through `run`; the queue itself keeps going
        this.queue = run.catch(() => undefined);
        return run;
    }

    private async rebuild(nextSettings: RoutingSettings | null): Promise<RefreshResult> {
        let error: DiscoveryUnavailableError | null = null;
        try {
            const listed = await this.discovery.listModels();
            this.rawModels = listed.map((m) => m.id);
            this.lastError = null;
        } catch (err) {
            error = new DiscoveryUnavailableError(errorMessage(err), err);
            this.lastError = error.message;
            logger.warn(`${error.message}; keeping generation ${this.published.id}`);
        }
        this.lastRefreshAt = Date.now();

        if (error && !nextSettings) {
            return {
                generation: this.published.id,
                models: this.published.snapshot.entries.size,
                degraded: true,
                error: error.message,
            };
        }

        const settings = nextSettings ?? this.published.settings;
        const id = this.nextId++;
        const next: Generation = Object.freeze({
            id,
            settings,
            snapshot: buildSnapshot(this.rawModels, settings, id),
        });
        this.published = next;

        const { tiers } = next.snapshot;
        logger.info(
            `Registry generation ${id}: ${tiers.SMALL.length} small, ` +
            `${tiers.MEDIUM.length} medium, ${tiers.LARGE.length} large`,
        );

        return {
            generation: id,
            models: next.snapshot.entries.size,
            degraded: error !== null,
            error: error?.message ?? null,
        };
    }

    startPolling(intervalMs: number): void {
        this.stopPolling();
        if (intervalMs <= 0) return;
        this.timer = setInterval(() => {
            this.refresh().catch((err: unknown) => {
                logger.error("Registry refresh failed:", errorMessage(err));
            });
        }, intervalMs);
        this.timer.unref();
    }

    stopPolling(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    health(): StoreHealth {
        const { id, snapshot } = this.published;
        return {
            status: this.lastError ? "degraded" : "ok",
            generation: id,
            models: snapshot.entries.size,
            lastRefreshAt: this.lastRefreshAt,
            lastError: this.lastError,
            unparsedModels: [...snapshot.degraded],
        };
    }
}
