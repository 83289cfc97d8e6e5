import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, toRoutingSettings } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { loadRoutingRules } from "../src/router/config.js";

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tierwise-config-"));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

function writeJson(name: string, value: unknown): string {
    const file = join(dir, name);
    writeFileSync(file, JSON.stringify(value));
    return file;
}

function configError(fn: () => unknown): ConfigError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ConfigError) return err;
        throw err;
    }
    throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
    it("fills every default when nothing is configured", () => {
        const config = loadConfig({ cwd: dir, env: {} });
        expect(config).toEqual({
            server: { host: "127.0.0.1", port: 3402 },
            backend: { baseUrl: "http://localhost:11434/v1", requestTimeoutMs: 10_000 },
            registry: {
                refreshIntervalMs: 300_000,
                filter: { mode: "deny", models: [] },
                tierOverrides: {},
                smallMaxParamsB: 10,
                mediumMaxParamsB: 40,
                defaultParamsB: 20,
            },
            scoring: {
                thresholds: { low: 0.3, high: 0.7 },
                uncertainBand: { low: 0.3, high: 0.7 },
            },
            classifier: { enabled: true, timeoutMs: 5_000 },
            storage: { dbPath: "data/tierwise.db" },
            logLevel: "info",
        });
    });

    it("reads tierwise.config.json from the working directory", () => {
        writeJson("tierwise.config.json", {
            registry: { smallMaxParamsB: 8, tierOverrides: { "llama3.1:8b": "MEDIUM" } },
            classifier: { model: "qwen2.5:0.5b" },
        });
        const config = loadConfig({ cwd: dir, env: {} });
        expect(config.registry.smallMaxParamsB).toBe(8);
        expect(config.registry.mediumMaxParamsB).toBe(40);
        expect(config.registry.tierOverrides).toEqual({ "llama3.1:8b": "MEDIUM" });
        expect(config.classifier).toEqual({ enabled: true, model: "qwen2.5:0.5b", timeoutMs: 5_000 });
    });

    it("reads an explicit path, also through TIERWISE_CONFIG", () => {
        writeJson("custom.json", { server: { port: 4000 } });
        expect(loadConfig({ cwd: dir, env: {}, path: "custom.json" }).server.port).toBe(4000);
        expect(loadConfig({ cwd: dir, env: { TIERWISE_CONFIG: "custom.json" } }).server.port).toBe(4000);
    });

    it("rejects a missing explicit file", () => {
        const err = configError(() => loadConfig({ cwd: dir, env: {}, path: "absent.json" }));
        expect(err.message).toBe(`Config file not found: ${join(dir, "absent.json")}`);
    });

    it("rejects a file that is not a JSON object", () => {
        writeFileSync(join(dir, "tierwise.config.json"), "[1, 2]");
        const err = configError(() => loadConfig({ cwd: dir, env: {} }));
        expect(err.message).toBe(`Config file ${join(dir, "tierwise.config.json")} must contain a JSON object`);
    });

    it("lets environment variables win over the file", () => {
        writeJson("tierwise.config.json", { server: { port: 4000 }, logLevel: "warn" });
        const config = loadConfig({
            cwd: dir,
            env: {
                TIERWISE_PORT: "9000",
                TIERWISE_HOST: "0.0.0.0",
                TIERWISE_BACKEND_URL: "http://backend.test/v1",
                TIERWISE_API_KEY: "test-secret",
                TIERWISE_REFRESH_INTERVAL_MS: "0",
                TIERWISE_CLASSIFIER_MODEL: "tiny-1b",
                TIERWISE_DB_PATH: ":memory:",
                TIERWISE_LOG_LEVEL: "debug",
            },
        });
        expect(config.server).toEqual({ host: "0.0.0.0", port: 9000 });
        expect(config.backend).toEqual({
            baseUrl: "http://backend.test/v1",
            apiKey: "test-secret",
            requestTimeoutMs: 10_000,
        });
        expect(config.registry.refreshIntervalMs).toBe(0);
        expect(config.classifier.model).toBe("tiny-1b");
        expect(config.storage.dbPath).toBe(":memory:");
        expect(config.logLevel).toBe("debug");
    });

    it("rejects a non-numeric port", () => {
        const err = configError(() => loadConfig({ cwd: dir, env: { TIERWISE_PORT: "abc" } }));
        expect(err.code).toBe("invalid_config");
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^server\.port: /);
    });

    it("rejects inverted score bands", () => {
        writeJson("tierwise.config.json", { scoring: { thresholds: { low: 0.8, high: 0.2 } } });
        const err = configError(() => loadConfig({ cwd: dir, env: {} }));
        expect(err.issues).toEqual(["scoring.thresholds: low must be below high"]);
    });

    it("rejects parameter limits out of order", () => {
        writeJson("tierwise.config.json", { registry: { smallMaxParamsB: 50 } });
        const err = configError(() => loadConfig({ cwd: dir, env: {} }));
        expect(err.issues).toEqual(["registry.smallMaxParamsB: smallMaxParamsB must be below mediumMaxParamsB"]);
    });
});

describe("toRoutingSettings", () => {
    it("maps configuration onto routing settings", () => {
        writeJson("tierwise.config.json", {
            registry: {
                filter: { mode: "allow", models: ["llama3.1:8b"] },
                tierOverrides: { "llama3.1:8b": "LARGE" },
                smallMaxParamsB: 7,
                mediumMaxParamsB: 30,
                defaultParamsB: 12,
            },
            scoring: { thresholds: { low: 0.2, high: 0.8 } },
            classifier: { enabled: false, timeoutMs: 2_000 },
        });
        const settings = toRoutingSettings(loadConfig({ cwd: dir, env: {} }));

        expect(settings).toEqual({
            thresholds: { smallMaxParamsB: 7, mediumMaxParamsB: 30 },
            defaultParamsB: 12,
            filter: { mode: "allow", models: ["llama3.1:8b"] },
            tierOverrides: { "llama3.1:8b": "LARGE" },
            scoreThresholds: { low: 0.2, high: 0.8 },
            uncertainBand: { low: 0.3, high: 0.7 },
            classifier: { enabled: false, model: undefined, timeoutMs: 2_000 },
            rules: loadRoutingRules(),
        });
    });

    it("loads a replacement keyword table", () => {
        const rules = {
            complexKeywords: ["quantum"],
            simpleKeywords: ["hello"],
            codingKeywords: ["assembly"],
            excludeMarkers: ["embed"],
            coderMarkers: ["coder"],
        };
        const rulesPath = writeJson("rules.json", rules);
        writeJson("tierwise.config.json", { scoring: { rulesPath } });

        expect(toRoutingSettings(loadConfig({ cwd: dir, env: {} })).rules).toEqual(rules);
    });

    it("rejects an invalid keyword table", () => {
        const rulesPath = writeJson("rules.json", { complexKeywords: "quantum" });
        writeJson("tierwise.config.json", { scoring: { rulesPath } });

        const config = loadConfig({ cwd: dir, env: {} });
        expect(() => toRoutingSettings(config)).toThrow(ConfigError);
    });

    it("names a keyword entry that is not a valid pattern", () => {
        const rulesPath = writeJson("rules.json", {
            complexKeywords: ["quantum"],
            simpleKeywords: ["hello"],
            codingKeywords: ["assembly", "c++ code"],
            excludeMarkers: ["embed"],
            coderMarkers: ["coder"],
        });

        const err = configError(() => loadRoutingRules(rulesPath));
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^codingKeywords\.1: invalid pattern "c\+\+ code" \(/);
    });

    it("leaves marker entries as plain substrings", () => {
        const rulesPath = writeJson("rules.json", {
            complexKeywords: ["quantum"],
            simpleKeywords: ["hello"],
            codingKeywords: ["assembly"],
            excludeMarkers: ["embed("],
            coderMarkers: ["c++"],
        });

        expect(loadRoutingRules(rulesPath).coderMarkers).toEqual(["c++"]);
    });
});
