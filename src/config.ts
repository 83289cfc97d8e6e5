/**
 * Configuration
 *
 * Defaults ← optional JSON file ← TIERWISE_* environment variables,
 * validated as a whole. The CLI loads `.env` through dotenv before this runs.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { loadRoutingRules } from "./router/config.js";
import type { RoutingSettings } from "./router/types.js";

const tierSchema = z.enum(["SMALL", "MEDIUM", "LARGE"]);

const bandSchema = z
    .object({
        low: z.number().min(0).max(1),
        high: z.number().min(0).max(1),
    })
    .refine((b) => b.low < b.high, { message: "low must be below high" });

export const configSchema = z
    .object({
        server: z
            .object({
                host: z.string().default("127.0.0.1"),
                port: z.number().int().min(0).max(65_535).default(3402),
            })
            .default({}),
        backend: z
            .object({
                baseUrl: z.string().url().default("http://localhost:11434/v1"),
                apiKey: z.string().optional(),
                requestTimeoutMs: z.number().int().positive().default(10_000),
            })
            .default({}),
        registry: z
            .object({
                refreshIntervalMs: z.number().int().min(0).default(300_000),
                filter: z
                    .object({
                        mode: z.enum(["allow", "deny"]).default("deny"),
                        models: z.array(z.string()).default([]),
                    })
                    .default({}),
                tierOverrides: z.record(tierSchema).default({}),
                smallMaxParamsB: z.number().positive().default(10),
                mediumMaxParamsB: z.number().positive().default(40),
                defaultParamsB: z.number().positive().default(20),
            })
            .default({}),
        scoring: z
            .object({
                thresholds: bandSchema.default({ low: 0.3, high: 0.7 }),
                uncertainBand: bandSchema.default({ low: 0.3, high: 0.7 }),
                /** Replacement for the bundled data/routing-rules.json */
                rulesPath: z.string().optional(),
            })
            .default({}),
        classifier: z
            .object({
                enabled: z.boolean().default(true),
                /** Pin the classifier instead of using the smallest model */
                model: z.string().optional(),
                timeoutMs: z.number().int().positive().default(5_000),
            })
            .default({}),
        storage: z
            .object({
                /** SQLite file for the decision log; ":memory:" keeps it in process */
                dbPath: z.string().default("data/tierwise.db"),
            })
            .default({}),
        logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    })
    .superRefine((cfg, ctx) => {
        if (cfg.registry.smallMaxParamsB >= cfg.registry.mediumMaxParamsB) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["registry", "smallMaxParamsB"],
                message: "smallMaxParamsB must be below mediumMaxParamsB",
            });
        }
    });

export type TierwiseConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = "tierwise.config.json";

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const existing = root[key];
    if (isRecord(existing)) return existing;
    const created: Record<string, unknown> = {};
    root[key] = created;
    return created;
}

function readConfigFile(path: string): Record<string, unknown> {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${path}`, [String(err)]);
    }
    if (!isRecord(raw)) {
        throw new ConfigError(`Config file ${path} must contain a JSON object`);
    }
    return raw;
}

function applyEnv(raw: Record<string, unknown>, env: Env): void {
    const num = (v: string) => (v.trim() === "" ? Number.NaN : Number(v));

    if (env.TIERWISE_PORT) section(raw, "server").port = num(env.TIERWISE_PORT);
    if (env.TIERWISE_HOST) section(raw, "server").host = env.TIERWISE_HOST;
    if (env.TIERWISE_BACKEND_URL) section(raw, "backend").baseUrl = env.TIERWISE_BACKEND_URL;
    if (env.TIERWISE_API_KEY) section(raw, "backend").apiKey = env.TIERWISE_API_KEY;
    if (env.TIERWISE_REFRESH_INTERVAL_MS) {
        section(raw, "registry").refreshIntervalMs = num(env.TIERWISE_REFRESH_INTERVAL_MS);
    }
    if (env.TIERWISE_CLASSIFIER_MODEL) section(raw, "classifier").model = env.TIERWISE_CLASSIFIER_MODEL;
    if (env.TIERWISE_DB_PATH) section(raw, "storage").dbPath = env.TIERWISE_DB_PATH;
    if (env.TIERWISE_LOG_LEVEL) raw.logLevel = env.TIERWISE_LOG_LEVEL;
}

export type LoadConfigOptions = {
    /** Explicit file; must exist when given */
    path?: string;
    env?: Env;
    cwd?: string;
};

export function loadConfig(opts: LoadConfigOptions = {}): TierwiseConfig {
    const env = opts.env ?? process.env;
    const cwd = opts.cwd ?? process.cwd();

    let raw: Record<string, unknown> = {};
    const explicit = opts.path ?? env.TIERWISE_CONFIG;
    if (explicit) {
        const file = resolve(cwd, explicit);
        if (!existsSync(file)) throw new ConfigError(`Config file not found: ${file}`);
        raw = readConfigFile(file);
    } else {
        const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
        if (existsSync(fallback)) raw = readConfigFile(fallback);
    }

    applyEnv(raw, env);

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            "Invalid configuration",
            parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
        );
    }
    return parsed.data;
}

/** Settings published with each registry generation */
export function toRoutingSettings(config: TierwiseConfig): RoutingSettings {
    return {
        thresholds: {
            smallMaxParamsB: config.registry.smallMaxParamsB,
            mediumMaxParamsB: config.registry.mediumMaxParamsB,
        },
        defaultParamsB: config.registry.defaultParamsB,
        filter: {
            mode: config.registry.filter.mode,
            models: [...config.registry.filter.models],
        },
        tierOverrides: { ...config.registry.tierOverrides },
        scoreThresholds: { ...config.scoring.thresholds },
        uncertainBand: { ...config.scoring.uncertainBand },
        classifier: {
            enabled: config.classifier.enabled,
            model: config.classifier.model,
            timeoutMs: config.classifier.timeoutMs,
        },
        rules: loadRoutingRules(config.scoring.rulesPath),
    };
}
