import { lookupGroup } from "./registry.js";
import type { CodingSignal } from "./rules.js";
import type { ModelEntry, RegistrySnapshot, Tier } from "./types.js";

export type Selection = {
    entry: ModelEntry;
    preferCoder: boolean;
    reasons: string[];
};

function smallestCoder(entries: readonly ModelEntry[]): ModelEntry | undefined {
    let best: ModelEntry | undefined;
    for (const entry of entries) {
        if (!entry.capability.isCoder) continue;
        if (
            !best ||
            entry.capability.totalParams < best.capability.totalParams ||
            (entry.capability.totalParams === best.capability.totalParams && entry.id < best.id)
        ) {
            best = entry;
        }
    }
    return best;
}

/**
 * Pick the model for a tier. Coding tasks take the smallest coder model in
 * the resolved group when there is one; everything else takes the group's
 * first entry. Throws NoEligibleModelError on an empty snapshot.
 */
export function selectModel(snapshot: RegistrySnapshot, tier: Tier, coding: CodingSignal): Selection {
    const group = lookupGroup(snapshot, tier);
    const reasons: string[] = [];
    if (group.tier !== tier) {
        reasons.push(`no ${tier} models, fell back to ${group.tier}`);
    }

    if (coding.isCoding) {
        const coder = smallestCoder(group.entries);
        if (coder) {
            reasons.push(`coder preference: ${coder.id} (${coding.reason ?? "coding task"})`);
            return { entry: coder, preferCoder: true, reasons };
        }
    }

    return { entry: group.entries[0], preferCoder: false, reasons };
}
