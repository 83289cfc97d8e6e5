/**
 * tierwise library API
 *
 *   import { route, ModelStore, createBackendClient } from "tierwise";
 */

export {
    route,
    decisionHeaders,
    decisionSummary,
    AUTO_MODEL,
    buildSnapshot,
    emptySnapshot,
    lookup,
    lookupGroup,
    pickClassifierModel,
    tierProbeOrder,
    tierForParams,
    extractCapability,
    scoreRequest,
    scoreToTier,
    detectCodingTask,
    isUncertain,
    classifyWithModel,
    parseTier,
    selectModel,
    getDefaultSettings,
    loadRoutingRules,
    TIER_ORDER,
} from "./router/index.js";
export type { RouterOptions } from "./router/index.js";
export { ModelStore } from "./models/store.js";
export type { RefreshResult, StoreHealth } from "./models/store.js";
export { createBackendClient } from "./upstream/client.js";
export type { BackendClient, BackendClientOptions } from "./upstream/client.js";
export { loadConfig, toRoutingSettings, configSchema } from "./config.js";
export type { TierwiseConfig, LoadConfigOptions } from "./config.js";
export { createProxyServer, startProxy } from "./server/index.js";
export type { ServerContext } from "./server/index.js";
export { openDatabase } from "./storage/db.js";
export { createDecisionLog } from "./storage/stats.js";
export type { DecisionLog, DecisionSummary } from "./storage/stats.js";
export { logger, setLogLevel } from "./logger.js";
export {
    RouterError,
    NoEligibleModelError,
    RoutingAbortedError,
    DiscoveryUnavailableError,
    BackendError,
    ConfigError,
} from "./errors.js";
export type {
    Tier,
    ModelCapability,
    ModelEntry,
    RegistrySnapshot,
    RoutingDecision,
    RoutingSettings,
    Generation,
    HeuristicResult,
} from "./router/types.js";
export type {
    ChatMessage,
    ChatCompletionRequest,
    ChatCompletionResponse,
    RoutingSummary,
    DiscoveredModel,
    ModelDiscovery,
    ModelInvoker,
    DecisionRecord,
} from "./types.js";
