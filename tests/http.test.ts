import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "node:http";
import { createHttpApp, startHttpTransport } from "../src/transport/http";
import { err } from "../src/types";
import { createTestContext, MAGELLAN } from "./helpers/context";

async function listen(reply?: Parameters<typeof createTestContext>[0]) {
  const { ctx, generator } = await createTestContext(reply);
  const server = await startHttpTransport(createHttpApp(ctx), 0, "127.0.0.1");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("expected a TCP address");
  return { ctx, generator, server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
}

const postJson = (url: string, body: string) =>
  fetch(url, { method: "POST", headers: { "content-type": "application/json" }, body });

describe("HTTP transport", () => {
  let server: Server;
  let baseUrl: string;
  let generatorRequests: () => number;

  beforeAll(async () => {
    const started = await listen();
    server = started.server;
    baseUrl = started.baseUrl;
    generatorRequests = () => started.generator.requests.length;
  });

  afterAll(async () => {
    await close(server);
  });

  it("GET / confirms liveness", async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("RAG API is running!");
  });

  it("allows cross-origin callers", async () => {
    const res = await fetch(`${baseUrl}/`, { headers: { origin: "http://localhost:3000" } });
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("POST /query answers with the retrieved documents", async () => {
    const res = await postJson(`${baseUrl}/query`, JSON.stringify({ query: "Who was Magellan?" }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ retrieved_docs: [MAGELLAN], response: "A scripted answer." });
  });

  it("honours top_k and threshold from the body", async () => {
    const res = await postJson(
      `${baseUrl}/query`,
      JSON.stringify({ query: "Magellan the explorer", top_k: 2, threshold: -1 }),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      retrieved_docs: [MAGELLAN, "The Eiffel Tower is located in Paris, France."],
      response: "A scripted answer.",
    });
  });

  it.each([
    ["an empty query", { query: "" }],
    ["a whitespace-only query", { query: "   \n\t" }],
    ["a missing query", {}],
    ["a non-string query", { query: 42 }],
  ])("rejects %s with 400", async (_label, body) => {
    const before = generatorRequests();
    const res = await postJson(`${baseUrl}/query`, JSON.stringify(body));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Query is required" });
    expect(generatorRequests()).toBe(before);
  });

  it("rejects an out-of-range top_k", async () => {
    const res = await postJson(`${baseUrl}/query`, JSON.stringify({ query: "Moon", top_k: 0 }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request body" });
  });

  it("rejects malformed JSON", async () => {
    const res = await postJson(`${baseUrl}/query`, "{\"query\":");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("GET /health reports readiness and counters", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({
      version: "0.1.0",
      modelName: "test/keyword-embedder",
      generationModel: "test/scripted",
      ready: true,
      corpus: { documents: 5, embedded: 5 },
    });
  });
});

describe("HTTP transport with a failing generator", () => {
  it("maps a pipeline failure to a generic 500", async () => {
    const { server, baseUrl, ctx } = await listen(err({ kind: "api", message: "connection reset" }));
    try {
      const res = await postJson(`${baseUrl}/query`, JSON.stringify({ query: "Who was Magellan?" }));
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "Internal server error" });
      expect(ctx.status.getStatus().queries).toEqual({ total: 1, failures: 1 });
    } finally {
      await close(server);
    }
  });
});
