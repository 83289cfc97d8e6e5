/**
 * Model Registry
 *
 * Builds immutable tier snapshots from a discovered model list and
 * answers tier lookups against them.
 */

import { NoEligibleModelError } from "../errors.js";
import { logger } from "../logger.js";
import { extractCapability } from "./params.js";
import {
    TIER_ORDER,
    type ModelEntry,
    type ParamThresholds,
    type RegistrySnapshot,
    type RoutingSettings,
    type Tier,
} from "./types.js";

export type RegistryPolicy = Pick<
    RoutingSettings,
    "filter" | "tierOverrides" | "thresholds" | "defaultParamsB" | "rules"
>;

export function tierForParams(totalParams: number, thresholds: ParamThresholds): Tier {
    if (totalParams <= thresholds.smallMaxParamsB) return "SMALL";
    if (totalParams <= thresholds.mediumMaxParamsB) return "MEDIUM";
    return "LARGE";
}

/** Larger models first, then by id, so lookups are reproducible */
function compareEntries(a: ModelEntry, b: ModelEntry): number {
    const byParams = b.capability.totalParams - a.capability.totalParams;
    if (byParams !== 0) return byParams;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function passesFilter(id: string, policy: RegistryPolicy): boolean {
    const listed = policy.filter.models.includes(id);
    return policy.filter.mode === "allow" ? listed : !listed;
}

export function emptySnapshot(generation = 0): RegistrySnapshot {
    return buildSnapshot([], {
        filter: { mode: "deny", models: [] },
        tierOverrides: {},
        thresholds: { smallMaxParamsB: 0, mediumMaxParamsB: 0 },
        defaultParamsB: 0,
        rules: { complexKeywords: [], simpleKeywords: [], codingKeywords: [], excludeMarkers: [], coderMarkers: [] },
    }, generation);
}

/**
 * Build a snapshot: extract → drop excluded → filter → tier → override → group.
 */
export function buildSnapshot(
    rawModels: readonly string[],
    policy: RegistryPolicy,
    generation = 0,
): RegistrySnapshot {
    const entries = new Map<string, ModelEntry>();
    const degraded: string[] = [];

    for (const id of rawModels) {
        if (entries.has(id)) continue;

        const capability = extractCapability(id, {
            defaultParamsB: policy.defaultParamsB,
            excludeMarkers: policy.rules.excludeMarkers,
            coderMarkers: policy.rules.coderMarkers,
        });
        if (capability.isExcluded) {
            logger.debug(`Registry: excluding ${id} (non-chat model family)`);
            continue;
        }
        if (!passesFilter(id, policy)) {
            logger.debug(`Registry: ${id} filtered out by ${policy.filter.mode} list`);
            continue;
        }

        const override = Object.hasOwn(policy.tierOverrides, id) ? policy.tierOverrides[id] : undefined;
        if (capability.paramsSource === "default") {
            degraded.push(id);
            logger.warn(`Registry: no parameter count in "${id}", assuming ${capability.totalParams}B`);
        }

        const entry: ModelEntry = {
            id,
            capability,
            tier: override ?? tierForParams(capability.totalParams, policy.thresholds),
            tierSource: override ? "override" : "computed",
        };
        entries.set(id, Object.freeze(entry));
    }

    const tiers: Record<Tier, ModelEntry[]> = { SMALL: [], MEDIUM: [], LARGE: [] };
    for (const entry of entries.values()) {
        tiers[entry.tier].push(entry);
    }
    for (const tier of TIER_ORDER) {
        Object.freeze(tiers[tier].sort(compareEntries));
    }

    return Object.freeze({
        generation,
        builtAt: Date.now(),
        tiers: Object.freeze(tiers),
        entries,
        degraded: Object.freeze(degraded),
    });
}

/**
 * Tiers to probe for a request: the tier itself, every larger tier
 * in ascending order, then every smaller tier in descending order.
 */
export function tierProbeOrder(tier: Tier): Tier[] {
    const index = TIER_ORDER.indexOf(tier);
    return [
        ...TIER_ORDER.slice(index),
        ...TIER_ORDER.slice(0, index).reverse(),
    ];
}

export function lookupGroup(
    snapshot: RegistrySnapshot,
    tier: Tier,
): { tier: Tier; entries: readonly ModelEntry[] } {
    for (const candidate of tierProbeOrder(tier)) {
        const group = snapshot.tiers[candidate];
        if (group.length > 0) return { tier: candidate, entries: group };
    }
    throw new NoEligibleModelError(tier);
}

export function lookup(snapshot: RegistrySnapshot, tier: Tier): ModelEntry {
    const { entries } = lookupGroup(snapshot, tier);
    return entries[0];
}

export function findEntry(snapshot: RegistrySnapshot, id: string): ModelEntry | undefined {
    return snapshot.entries.get(id);
}

export function allEntries(snapshot: RegistrySnapshot): ModelEntry[] {
    return TIER_ORDER.flatMap((tier) => snapshot.tiers[tier]);
}

/** Smallest eligible model by total parameters; ties go to the lower id */
export function pickClassifierModel(snapshot: RegistrySnapshot): ModelEntry {
    let best: ModelEntry | undefined;
    for (const entry of snapshot.entries.values()) {
        if (
            !best ||
            entry.capability.totalParams < best.capability.totalParams ||
            (entry.capability.totalParams === best.capability.totalParams && entry.id < best.id)
        ) {
            best = entry;
        }
    }
    if (!best) throw new NoEligibleModelError();
    return best;
}
