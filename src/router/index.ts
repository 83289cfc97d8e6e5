/**
 * Router Orchestrator
 *
 * explicit model → heuristic score → classifier (ambiguous scores only)
 * → coder preference → tier lookup. One pass, no retries.
 */

import { NoEligibleModelError, RoutingAbortedError } from "../errors.js";
import type { ChatCompletionRequest, ModelInvoker, RoutingSummary } from "../types.js";
import { classifyWithModel, type ClassifierOutcome } from "./classifier.js";
import { findEntry, pickClassifierModel } from "./registry.js";
import { detectCodingTask, scoreRequest, scoreToTier } from "./rules.js";
import { selectModel } from "./selector.js";
import type { Generation, RoutingDecision, RoutingPath } from "./types.js";

export type RouterOptions = {
    /** The generation this decision reads; model ids and thresholds both come from it */
    generation: Generation;
    /** Backend used for the classifier call */
    invoker?: ModelInvoker;
    /** Aborting abandons a decision that is waiting on the classifier */
    signal?: AbortSignal;
};

export const AUTO_MODEL = "auto";

function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) return Promise.reject(new RoutingAbortedError());

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new RoutingAbortedError());
        signal.addEventListener("abort", onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(err);
            },
        );
    });
}

async function runClassifier(
    request: ChatCompletionRequest,
    options: RouterOptions,
): Promise<ClassifierOutcome> {
    const { snapshot, settings } = options.generation;
    if (!settings.classifier.enabled) {
        return { ok: false, model: null, reason: "classifier disabled" };
    }
    if (!options.invoker) {
        return { ok: false, model: null, reason: "no backend for classifier" };
    }

    const pinned = settings.classifier.model;
    let model: string;
    if (pinned && findEntry(snapshot, pinned)) {
        model = pinned;
    } else if (snapshot.entries.size > 0) {
        model = pickClassifierModel(snapshot).id;
    } else {
        return { ok: false, model: null, reason: "no model available for classification" };
    }

    return classifyWithModel(request, model, {
        invoker: options.invoker,
        timeoutMs: settings.classifier.timeoutMs,
    });
}

/**
 * Route a chat completion request to one backend model.
 *
 * Throws NoEligibleModelError when the snapshot holds no model at all and
 * RoutingAbortedError when `signal` fires during classification.
 */
export async function route(
    request: ChatCompletionRequest,
    options: RouterOptions,
): Promise<RoutingDecision> {
    const { snapshot, settings } = options.generation;
    const reasons: string[] = [];

    // 1. Explicit model
    const requested = request.model?.trim();
    if (requested && requested !== AUTO_MODEL) {
        const entry = findEntry(snapshot, requested);
        if (entry) {
            return {
                tier: entry.tier,
                selectedModel: entry.id,
                modelTier: entry.tier,
                routingPath: "explicit",
                score: null,
                confidence: null,
                reasons: [`explicit model ${entry.id}`],
                preferCoder: false,
                generation: options.generation.id,
            };
        }
        reasons.push(`requested model ${requested} not available, auto-routing`);
    }

    // 2. Heuristics
    const heuristic = scoreRequest(request, {
        rules: settings.rules,
        uncertainBand: settings.uncertainBand,
    });
    reasons.push(...heuristic.reasons);
    let tier = scoreToTier(heuristic.score, settings.scoreThresholds);
    let routingPath: RoutingPath = "heuristic";

    // 3. Classifier, only for ambiguous scores
    if (heuristic.confidence === "low") {
        const outcome = await untilAborted(runClassifier(request, options), options.signal);
        if (outcome.ok) {
            tier = outcome.tier;
            routingPath = "classifier";
            reasons.push(`classifier ${outcome.model} chose ${outcome.tier}`);
        } else {
            reasons.push(`${outcome.reason}, using heuristic tier ${tier}`);
        }
    }

    // 4 + 5. Coder preference and selection
    if (snapshot.entries.size === 0) throw new NoEligibleModelError(tier);
    const selection = selectModel(snapshot, tier, detectCodingTask(request, settings.rules));
    reasons.push(...selection.reasons);

    return {
        tier,
        selectedModel: selection.entry.id,
        modelTier: selection.entry.tier,
        routingPath,
        score: heuristic.score,
        confidence: heuristic.confidence,
        reasons,
        preferCoder: selection.preferCoder,
        generation: options.generation.id,
    };
}

// ── Decision metadata ───────────────────────────────────────────────

export function decisionHeaders(decision: RoutingDecision): Record<string, string> {
    return {
        "X-Router-Tier": decision.tier,
        "X-Router-Model": decision.selectedModel,
        "X-Router-Path": decision.routingPath,
        "X-Router-Score": decision.score === null ? "none" : decision.score.toFixed(3),
        "X-Router-Coder": String(decision.preferCoder),
    };
}

export function decisionSummary(decision: RoutingDecision): RoutingSummary {
    return {
        tier: decision.tier,
        model: decision.selectedModel,
        path: decision.routingPath,
        score: decision.score,
        confidence: decision.confidence,
        preferCoder: decision.preferCoder,
        reasons: [...decision.reasons],
    };
}

export { buildSnapshot, emptySnapshot, lookup, lookupGroup, pickClassifierModel, tierProbeOrder, tierForParams } from "./registry.js";
export { extractCapability } from "./params.js";
export { scoreRequest, scoreToTier, detectCodingTask, isUncertain } from "./rules.js";
export { classifyWithModel, parseTier } from "./classifier.js";
export { selectModel } from "./selector.js";
export { getDefaultSettings, loadRoutingRules } from "./config.js";
export { TIER_ORDER } from "./types.js";
export type * from "./types.js";
