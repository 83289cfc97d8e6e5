import { z } from "zod";
import { BackendError } from "../errors.js";
import type {
    ChatCompletionRequest,
    CompleteOptions,
    DiscoveredModel,
    ModelDiscovery,
    ModelInvoker,
} from "../types.js";

export type BackendClientOptions = {
    /** OpenAI-compatible base URL, e.g. http://localhost:11434/v1 */
    baseUrl: string;
    apiKey?: string;
    /** Bound on model listing; completions are bounded by the caller's signal */
    requestTimeoutMs?: number;
    fetch?: typeof fetch;
};

export type BackendClient = ModelDiscovery & ModelInvoker & { readonly baseUrl: string };

const modelListSchema = z.object({
    data: z.array(z.object({ id: z.string().min(1) }).passthrough()),
});

/**
 * Client for an OpenAI-compatible backend: model discovery and chat completions.
 */
export function createBackendClient(opts: BackendClientOptions): BackendClient {
    const baseUrl = opts.baseUrl.replace(/\/+$/, "");
    const doFetch = opts.fetch ?? fetch;
    const timeoutMs = opts.requestTimeoutMs ?? 10_000;

    function headers(): Record<string, string> {
        const h: Record<string, string> = { "Content-Type": "application/json" };
        if (opts.apiKey) h["Authorization"] = `Bearer ${opts.apiKey}`;
        return h;
    }

    return {
        baseUrl,

        async listModels(): Promise<DiscoveredModel[]> {
            const url = `${baseUrl}/models`;
            const res = await doFetch(url, {
                method: "GET",
                headers: headers(),
                signal: AbortSignal.timeout(timeoutMs),
            });
            if (!res.ok) {
                throw new BackendError(res.status, await res.text(), url);
            }

            const parsed = modelListSchema.safeParse(await res.json());
            if (!parsed.success) {
                throw new BackendError(res.status, "unexpected model list shape", url);
            }
            return parsed.data.data.map(({ id, ...metadata }) => ({ id, metadata }));
        },

        async complete(request: ChatCompletionRequest, options: CompleteOptions = {}): Promise<Response> {
            return doFetch(`${baseUrl}/chat/completions`, {
                method: "POST",
                headers: headers(),
                body: JSON.stringify(request),
                signal: options.signal,
            });
        },
    };
}
