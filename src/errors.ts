import type { Tier } from "./router/types.js";

export type RouterErrorCode =
    | "no_eligible_model"
    | "routing_aborted"
    | "discovery_unavailable"
    | "backend_error"
    | "invalid_config";

export class RouterError extends Error {
    readonly code: RouterErrorCode;

    constructor(code: RouterErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** No tier holds a usable model. Fatal for the request, harmless for the registry. */
export class NoEligibleModelError extends RouterError {
    readonly requestedTier: Tier | null;

    constructor(requestedTier: Tier | null = null) {
        super(
            "no_eligible_model",
            requestedTier
                ? `No eligible model in any tier (requested ${requestedTier})`
                : "No eligible model in any tier",
        );
        this.requestedTier = requestedTier;
    }
}

/** The client went away while the decision was waiting on the classifier */
export class RoutingAbortedError extends RouterError {
    constructor() {
        super("routing_aborted", "Routing abandoned: request was cancelled");
    }
}

export class DiscoveryUnavailableError extends RouterError {
    constructor(message: string, cause?: unknown) {
        super("discovery_unavailable", `Model discovery failed: ${message}`, { cause });
    }
}

export class BackendError extends RouterError {
    readonly status: number;
    readonly body: string;

    constructor(status: number, body: string, url: string) {
        super("backend_error", `Backend returned ${status} for ${url}`);
        this.status = status;
        this.body = body;
    }
}

export class ConfigError extends RouterError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super("invalid_config", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
        this.issues = issues;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
