import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { setLogLevel } from "../src/logger.js";
import { ModelStore } from "../src/models/store.js";
import { route } from "../src/router/index.js";
import type { ModelDiscovery, ModelInvoker } from "../src/types.js";
import { FakeDiscovery, ambiguousRequest, answering, completionResponse, settingsWith } from "./fakes.js";

const MODELS = ["llama3.1:8b", "qwen2.5:32b", "llama3.3:70b", "qwen2.5:0.5b", "mystery-model"];

beforeAll(() => setLogLevel("silent"));

afterEach(() => {
    vi.useRealTimers();
});

describe("ModelStore", () => {
    it("starts with an empty generation 0", () => {
        const store = new ModelStore(new FakeDiscovery(MODELS), settingsWith());
        expect(store.current().id).toBe(0);
        expect(store.current().snapshot.entries.size).toBe(0);
    });

    it("publishes a new generation on refresh", async () => {
        const store = new ModelStore(new FakeDiscovery(MODELS), settingsWith());
        const result = await store.refresh();

        expect(result).toEqual({ generation: 1, models: 5, degraded: false, error: null });
        expect(store.current().id).toBe(1);
        expect(store.current().snapshot.tiers.LARGE.map((e) => e.id)).toEqual(["llama3.3:70b"]);
    });

    it("shares one in-flight refresh between callers", async () => {
        const discovery = new FakeDiscovery(MODELS);
        const store = new ModelStore(discovery, settingsWith());

        const first = store.refresh();
        const second = store.refresh();
        expect(second).toBe(first);
        await first;

        expect(discovery.calls).toBe(1);
        expect(store.current().id).toBe(1);
    });

    it("keeps the last good generation when discovery fails", async () => {
        const discovery = new FakeDiscovery(MODELS);
        const store = new ModelStore(discovery, settingsWith());
        await store.refresh();
        const before = store.current();

        discovery.failure = new Error("backend down");
        const result = await store.refresh();

        expect(result).toEqual({
            generation: 1,
            models: 5,
            degraded: true,
            error: "Model discovery failed: backend down",
        });
        expect(store.current()).toBe(before);
        expect(store.health()).toMatchObject({
            status: "degraded",
            generation: 1,
            lastError: "Model discovery failed: backend down",
        });
    });

    it("recovers once discovery answers again", async () => {
        const discovery = new FakeDiscovery(MODELS);
        discovery.failure = new Error("backend down");
        const store = new ModelStore(discovery, settingsWith());

        expect(await store.refresh()).toEqual({
            generation: 0,
            models: 0,
            degraded: true,
            error: "Model discovery failed: backend down",
        });

        discovery.failure = null;
        expect((await store.refresh()).generation).toBe(1);
        expect(store.health().status).toBe("ok");
    });

    it("re-tiers the last model list on reload when discovery is down", async () => {
        const discovery = new FakeDiscovery(MODELS);
        const store = new ModelStore(discovery, settingsWith());
        await store.refresh();

        discovery.failure = new Error("backend down");
        const result = await store.reload(settingsWith({ tierOverrides: { "llama3.1:8b": "LARGE" } }));

        expect(result.generation).toBe(2);
        expect(result.degraded).toBe(true);
        expect(store.current().snapshot.tiers.LARGE.map((e) => e.id)).toEqual(["llama3.3:70b", "llama3.1:8b"]);
    });

    it("publishes concurrent reloads in call order", async () => {
        // Later calls answer faster, so unordered rebuilds would finish backwards
        const delays = [30, 20, 1];
        let calls = 0;
        const discovery: ModelDiscovery = {
            listModels: () => {
                const delay = delays[calls++] ?? 0;
                return new Promise((resolve) => setTimeout(() => resolve(MODELS.map((id) => ({ id }))), delay));
            },
        };
        const store = new ModelStore(discovery, settingsWith());

        const results = await Promise.all([
            store.refresh(),
            store.reload(settingsWith({ tierOverrides: { "llama3.1:8b": "MEDIUM" } })),
            store.reload(settingsWith({ tierOverrides: { "llama3.1:8b": "LARGE" } })),
        ]);

        expect(results.map((r) => r.generation)).toEqual([1, 2, 3]);
        expect(store.current().id).toBe(3);
        expect(store.current().settings.tierOverrides).toEqual({ "llama3.1:8b": "LARGE" });
        expect(store.current().snapshot.tiers.LARGE.map((e) => e.id)).toEqual(["llama3.3:70b", "llama3.1:8b"]);

        // The finished refresh is no longer shared
        expect((await store.refresh()).generation).toBe(4);
        expect(calls).toBe(4);
    });

    it("reports unparsed model ids in health", async () => {
        const store = new ModelStore(new FakeDiscovery(MODELS), settingsWith());
        await store.refresh();
        expect(store.health()).toMatchObject({
            status: "ok",
            generation: 1,
            models: 5,
            lastError: null,
            unparsedModels: ["mystery-model"],
        });
    });

    it("never mixes generations inside one decision", async () => {
        const store = new ModelStore(new FakeDiscovery(MODELS), settingsWith());
        await store.refresh();

        let release: (answer: string) => void = () => undefined;
        const slow: ModelInvoker = {
            complete: (request) =>
                new Promise<Response>((resolve) => {
                    release = (answer) => resolve(completionResponse(answer, request.model));
                }),
        };

        const pending = route(ambiguousRequest(), { generation: store.current(), invoker: slow });

        // Reload while the first decision waits on its classifier
        await store.reload(
            settingsWith({
                tierOverrides: { "llama3.3:70b": "MEDIUM" },
                thresholds: { smallMaxParamsB: 1, mediumMaxParamsB: 100 },
            }),
        );
        expect(store.current().id).toBe(2);

        release("MEDIUM");
        const before = await pending;
        expect(before.generation).toBe(1);
        expect(before.selectedModel).toBe("qwen2.5:32b");

        const { invoker } = answering("MEDIUM");
        const after = await route(ambiguousRequest(), { generation: store.current(), invoker });
        expect(after.generation).toBe(2);
        expect(after.selectedModel).toBe("llama3.3:70b");
    });

    it("polls discovery on an interval until stopped", async () => {
        vi.useFakeTimers();
        const discovery = new FakeDiscovery(MODELS);
        const store = new ModelStore(discovery, settingsWith());

        store.startPolling(1_000);
        await vi.advanceTimersByTimeAsync(1_000);
        expect(discovery.calls).toBe(1);
        await vi.advanceTimersByTimeAsync(1_000);
        expect(discovery.calls).toBe(2);

        store.stopPolling();
        await vi.advanceTimersByTimeAsync(5_000);
        expect(discovery.calls).toBe(2);
        expect(store.current().id).toBe(2);
    });
});
