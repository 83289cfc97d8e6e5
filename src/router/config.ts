import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors.js";
import type { ParamThresholds, RoutingRules, RoutingSettings, ScoreBand } from "./types.js";

// ── Keyword / marker tables ─────────────────────────────────────────

// Resolves to <package>/data from both src/router and dist/router
const RULES_PATH = fileURLToPath(new URL("../../data/routing-rules.json", import.meta.url));

// Keyword entries are regex fragments joined into one alternation per table
const keywordList = z.array(z.string().min(1)).superRefine((entries, ctx) => {
    entries.forEach((source, index) => {
        try {
            new RegExp(`(?:${source})`, "u");
        } catch (err) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `invalid pattern "${source}" (${errorMessage(err)})`,
            });
        }
    });
});

export const routingRulesSchema = z.object({
    complexKeywords: keywordList,
    simpleKeywords: keywordList,
    codingKeywords: keywordList,
    excludeMarkers: z.array(z.string().min(1)),
    coderMarkers: z.array(z.string().min(1)),
});

let bundledRules: RoutingRules | null = null;

/**
 * Read a keyword/marker table. Without a path, the bundled
 * data/routing-rules.json is read once and reused.
 */
export function loadRoutingRules(path?: string): RoutingRules {
    if (!path && bundledRules) return bundledRules;

    const file = path ?? RULES_PATH;
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(file, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Cannot read routing rules from ${file}`, [String(err)]);
    }

    const parsed = routingRulesSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid routing rules in ${file}`,
            parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        );
    }
    if (!path) bundledRules = parsed.data;
    return parsed.data;
}

// ── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_PARAM_THRESHOLDS: ParamThresholds = {
    smallMaxParamsB: 10,
    mediumMaxParamsB: 40,
};

/** Parameter count (billions) assumed for ids with no parseable size */
export const DEFAULT_PARAMS_B = 20;

/** score < low → SMALL, score > high → LARGE, otherwise MEDIUM */
export const DEFAULT_SCORE_THRESHOLDS: ScoreBand = { low: 0.3, high: 0.7 };

/** Closed band: scores with low <= score <= high go to the classifier */
export const DEFAULT_UNCERTAIN_BAND: ScoreBand = { low: 0.3, high: 0.7 };

export const DEFAULT_CLASSIFIER_TIMEOUT_MS = 5_000;

export function getDefaultSettings(): RoutingSettings {
    return {
        thresholds: { ...DEFAULT_PARAM_THRESHOLDS },
        defaultParamsB: DEFAULT_PARAMS_B,
        filter: { mode: "deny", models: [] },
        tierOverrides: {},
        scoreThresholds: { ...DEFAULT_SCORE_THRESHOLDS },
        uncertainBand: { ...DEFAULT_UNCERTAIN_BAND },
        classifier: { enabled: true, timeoutMs: DEFAULT_CLASSIFIER_TIMEOUT_MS },
        rules: structuredClone(loadRoutingRules()),
    };
}
