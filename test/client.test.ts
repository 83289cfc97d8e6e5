import { describe, expect, it, vi } from "vitest";
import { BackendError } from "../src/errors.js";
import { createBackendClient } from "../src/upstream/client.js";

function stubFetch(respond: () => Response) {
    return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
}

describe("createBackendClient", () => {
    it("lists models from /models with the API key", async () => {
        const fetch = stubFetch(() => Response.json({ object: "list", data: [{ id: "llama3.1:8b", owned_by: "local" }] }));
        const client = createBackendClient({ baseUrl: "http://backend.test/v1/", apiKey: "test-secret", fetch });

        expect(await client.listModels()).toEqual([{ id: "llama3.1:8b", metadata: { owned_by: "local" } }]);
        expect(client.baseUrl).toBe("http://backend.test/v1");

        const [url, init] = fetch.mock.calls[0];
        expect(url).toBe("http://backend.test/v1/models");
        expect(init?.method).toBe("GET");
        expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    });

    it("throws a BackendError on a failed listing", async () => {
        const fetch = stubFetch(() => new Response("unauthorized", { status: 401 }));
        const client = createBackendClient({ baseUrl: "http://backend.test/v1", fetch });

        const err = await client.listModels().catch((e: unknown) => e);
        expect(err).toBeInstanceOf(BackendError);
        expect(err).toMatchObject({
            status: 401,
            body: "unauthorized",
            message: "Backend returned 401 for http://backend.test/v1/models",
        });
    });

    it("throws a BackendError on an unexpected listing shape", async () => {
        const fetch = stubFetch(() => Response.json({ models: ["llama3.1:8b"] }));
        const client = createBackendClient({ baseUrl: "http://backend.test/v1", fetch });

        await expect(client.listModels()).rejects.toMatchObject({ body: "unexpected model list shape" });
    });

    it("posts completions and hands back the raw response", async () => {
        const fetch = stubFetch(() => Response.json({ choices: [] }));
        const client = createBackendClient({ baseUrl: "http://backend.test/v1", fetch });
        const controller = new AbortController();

        const res = await client.complete(
            { model: "llama3.1:8b", messages: [{ role: "user", content: "hi" }] },
            { signal: controller.signal },
        );

        expect(res.status).toBe(200);
        const [url, init] = fetch.mock.calls[0];
        expect(url).toBe("http://backend.test/v1/chat/completions");
        expect(init?.method).toBe("POST");
        expect(init?.signal).toBe(controller.signal);
        expect(init?.body).toBe('{"model":"llama3.1:8b","messages":[{"role":"user","content":"hi"}]}');
        expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    });
});
