/** Capability tier, ordered SMALL < MEDIUM < LARGE */
export type Tier = "SMALL" | "MEDIUM" | "LARGE";

export const TIER_ORDER: readonly Tier[] = ["SMALL", "MEDIUM", "LARGE"];

/** Where a capability's parameter count came from */
export type ParamsSource = "parsed" | "default";

/** What a model id tells us about the model behind it */
export type ModelCapability = {
    /** Total parameters, in billions. MoE models are tiered by this figure. */
    totalParams: number;
    /** Active parameters per token for mixture-of-experts ids, otherwise null. */
    activeParams: number | null;
    isCoder: boolean;
    /** Embedding, reranker, OCR, speech and vision-encoder families never receive traffic. */
    isExcluded: boolean;
    paramsSource: ParamsSource;
};

export type ModelEntry = {
    id: string;
    capability: ModelCapability;
    tier: Tier;
    tierSource: "computed" | "override";
};

/** Immutable view of the eligible models, grouped by tier */
export type RegistrySnapshot = {
    readonly generation: number;
    readonly builtAt: number;
    readonly tiers: Readonly<Record<Tier, readonly ModelEntry[]>>;
    readonly entries: ReadonlyMap<string, ModelEntry>;
    /** Ids tiered from the default parameter count because nothing parsed */
    readonly degraded: readonly string[];
};

export type FilterPolicy = {
    mode: "allow" | "deny";
    models: string[];
};

export type ParamThresholds = {
    /** Largest total parameter count (billions) still considered SMALL */
    smallMaxParamsB: number;
    /** Largest total parameter count (billions) still considered MEDIUM */
    mediumMaxParamsB: number;
};

export type ScoreBand = {
    low: number;
    high: number;
};

/** Keyword and marker tables, kept as data so they can be extended without code changes */
export type RoutingRules = {
    complexKeywords: string[];
    simpleKeywords: string[];
    codingKeywords: string[];
    excludeMarkers: string[];
    coderMarkers: string[];
};

/** Everything a single routing decision reads, published together with its snapshot */
export type RoutingSettings = {
    thresholds: ParamThresholds;
    defaultParamsB: number;
    filter: FilterPolicy;
    tierOverrides: Record<string, Tier>;
    scoreThresholds: ScoreBand;
    uncertainBand: ScoreBand;
    classifier: {
        enabled: boolean;
        /** Pinned classifier model; the smallest eligible model is used when unset or absent */
        model?: string;
        timeoutMs: number;
    };
    rules: RoutingRules;
};

/** One published registry generation: snapshot plus the settings it was built from */
export type Generation = {
    readonly id: number;
    readonly settings: RoutingSettings;
    readonly snapshot: RegistrySnapshot;
};

export type Confidence = "low" | "high";

export type HeuristicResult = {
    /** Complexity estimate in [0, 1], rounded to three decimals */
    score: number;
    reasons: string[];
    confidence: Confidence;
};

export type RoutingPath = "explicit" | "heuristic" | "classifier";

/** Final routing decision */
export type RoutingDecision = {
    tier: Tier;
    selectedModel: string;
    /** Tier of the selected model; differs from `tier` after a cross-tier fallback or override */
    modelTier: Tier;
    routingPath: RoutingPath;
    score: number | null;
    confidence: Confidence | null;
    reasons: string[];
    preferCoder: boolean;
    generation: number;
};
