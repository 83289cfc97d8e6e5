/**
 * Parameter Extractor
 *
 * Reads parameter counts and family markers out of a model id.
 * Pure: the same id and options always give the same capability.
 */

import { DEFAULT_PARAMS_B, loadRoutingRules } from "./config.js";
import type { ModelCapability } from "./types.js";

export type ExtractOptions = {
    defaultParamsB?: number;
    excludeMarkers?: string[];
    coderMarkers?: string[];
};

const NUM = "(\\d+(?:\\.\\d+)?)";
// A figure starts after a separator, never mid-version ("llama3.1:8b" yields 8, not 1:8)
const BEFORE = "(?<![a-z0-9.])";
const AFTER = "(?![a-z0-9])";

// "30b-a3b", "30a3b": the figure prefixed with "a" is the active count.
// A separator is only allowed after the "b" ("llama-3-a8b" is no pair)
const TOTAL_ACTIVE = new RegExp(`${BEFORE}${NUM}(?:b[-_]?)?a${NUM}b${AFTER}`, "i");
// "8x7b": experts × expert size
const EXPERTS = new RegExp(`${BEFORE}(\\d+)x${NUM}b${AFTER}`, "i");
const BILLIONS = new RegExp(`${BEFORE}${NUM}b${AFTER}`, "gi");
const MILLIONS = new RegExp(`${BEFORE}${NUM}m${AFTER}`, "gi");

function round(n: number): number {
    return Math.round(n * 1000) / 1000;
}

function largest(id: string, pattern: RegExp): number | null {
    let best: number | null = null;
    for (const match of id.matchAll(pattern)) {
        const value = Number(match[1]);
        if (Number.isFinite(value) && (best === null || value > best)) best = value;
    }
    return best;
}

function parseParams(id: string): { total: number; active: number | null } | null {
    const pair = TOTAL_ACTIVE.exec(id);
    if (pair) {
        return { total: Number(pair[1]), active: Number(pair[2]) };
    }

    const experts = EXPERTS.exec(id);
    if (experts) {
        const perExpert = Number(experts[2]);
        return { total: round(Number(experts[1]) * perExpert), active: perExpert };
    }

    const billions = largest(id, BILLIONS);
    if (billions !== null) return { total: billions, active: null };

    const millions = largest(id, MILLIONS);
    if (millions !== null) return { total: round(millions / 1000), active: null };

    return null;
}

function hasMarker(id: string, markers: string[]): boolean {
    return markers.some((m) => id.includes(m.toLowerCase()));
}

/**
 * Derive a model's capability from its id.
 *
 * Ids with no recognisable size are given `defaultParamsB` and flagged with
 * `paramsSource: "default"`; they stay eligible for tiering.
 */
export function extractCapability(modelId: string, options: ExtractOptions = {}): ModelCapability {
    const id = modelId.toLowerCase();
    const rules =
        options.excludeMarkers && options.coderMarkers ? null : loadRoutingRules();
    const excludeMarkers = options.excludeMarkers ?? rules?.excludeMarkers ?? [];
    const coderMarkers = options.coderMarkers ?? rules?.coderMarkers ?? [];

    const parsed = parseParams(id);

    const capability: ModelCapability = {
        totalParams: parsed ? parsed.total : options.defaultParamsB ?? DEFAULT_PARAMS_B,
        activeParams: parsed ? parsed.active : null,
        isCoder: hasMarker(id, coderMarkers),
        isExcluded: hasMarker(id, excludeMarkers),
        paramsSource: parsed ? "parsed" : "default",
    };
    return Object.freeze(capability);
}
