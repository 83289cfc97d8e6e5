// ── Chat completion types (OpenAI-compatible subset) ───────────────

export type TextPart = { type: "text"; text: string };
export type ImagePart = { type: "image_url"; image_url: { url: string; detail?: string } };
export type ContentPart = TextPart | ImagePart | { type: string; [key: string]: unknown };

export type ChatMessage = {
    role: "system" | "developer" | "user" | "assistant" | "tool";
    content: string | ContentPart[] | null;
    name?: string;
    [key: string]: unknown;
};

export type ToolDeclaration = {
    type: string;
    function?: { name: string; description?: string; parameters?: unknown };
    [key: string]: unknown;
};

export type ChatCompletionRequest = {
    model?: string;
    messages: ChatMessage[];
    tools?: ToolDeclaration[];
    functions?: Array<{ name: string; [key: string]: unknown }>;
    temperature?: number;
    max_tokens?: number;
    stream?: boolean;
    [key: string]: unknown;
};

export type ChatCompletionChoice = {
    index: number;
    message: { role: string; content: string | null; [key: string]: unknown };
    finish_reason: string | null;
};

export type ChatCompletionResponse = {
    id: string;
    object: string;
    created: number;
    model: string;
    choices: ChatCompletionChoice[];
    usage?: {
        prompt_tokens: number;
        completion_tokens: number;
        total_tokens: number;
    };
    _routing?: RoutingSummary;
    [key: string]: unknown;
};

/** Decision metadata attached to JSON responses */
export type RoutingSummary = {
    tier: string;
    model: string;
    path: string;
    score: number | null;
    confidence: string | null;
    preferCoder: boolean;
    reasons: string[];
};

// ── Backend collaborators ──────────────────────────────────────────

export type DiscoveredModel = {
    id: string;
    metadata?: Record<string, unknown>;
};

/** Lists the models the backend currently serves */
export interface ModelDiscovery {
    listModels(): Promise<DiscoveredModel[]>;
}

export type CompleteOptions = {
    signal?: AbortSignal;
};

/** Sends a chat completion to one backend model; the response body may be an SSE stream */
export interface ModelInvoker {
    complete(request: ChatCompletionRequest, options?: CompleteOptions): Promise<Response>;
}

// ── Decision log ───────────────────────────────────────────────────

export type DecisionRecord = {
    timestamp: number;
    requestedModel: string | null;
    selectedModel: string;
    tier: string;
    routingPath: string;
    score: number | null;
    preferCoder: boolean;
    latencyMs: number;
    success: boolean;
    error?: string | null;
};
