import { describe, it, expect, afterEach } from "vitest";
import http from "http";
import axios, { type AxiosInstance } from "axios";
import { createApp } from "../../src/app.js";
import type { PipelineDeps } from "../../src/pipeline.js";
import { documentFromText } from "../../src/services/document_source.js";
import { DocumentIngestionFailedError, EmbeddingUnavailableError } from "../../src/utils/errors.js";
import { testPipeline } from "../helpers/pipeline.js";

const TEXT = "The grace period for premium payment is thirty days from the due date.";
const QUESTION = "What is the grace period for premium payment?";
const DOC_URL = "https://docs.test/policy.txt";

interface ValidationErrors {
  errors: { path: string; msg: string }[];
}

const servers: http.Server[] = [];

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve())))
  );
});

const loader: PipelineDeps["loader"] = { load: async (url) => documentFromText(TEXT, url) };

async function start(env: NodeJS.ProcessEnv = {}, deps: PipelineDeps = { loader }) {
  const setup = testPipeline(env, deps);
  const server = http.createServer(createApp(setup.pipeline, setup.settings));
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server is not listening on a port");
  const { port } = address;

  const client: AxiosInstance = axios.create({
    baseURL: `http://127.0.0.1:${port}/api/v1`,
    validateStatus: () => true,
  });
  const authed = { headers: { Authorization: "Bearer test-secret" } };
  return { ...setup, client, authed };
}

describe("HTTP API", () => {
  it("should report health without a token", async () => {
    const { client } = await start();

    const res = await client.get("/health");

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: "healthy", version: "1.0.0" });
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
  });

  it("should answer questions for a document URL", async () => {
    const { client, authed } = await start();

    const res = await client.post("/hackrx/run", { documents: DOC_URL, questions: [QUESTION, QUESTION] }, authed);

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ answers: ["30 days", "30 days"] });
  });

  it("should require a bearer token", async () => {
    const { client } = await start();

    const missing = await client.post("/hackrx/run", { documents: DOC_URL, questions: [QUESTION] });
    const wrong = await client.post(
      "/hackrx/run",
      { documents: DOC_URL, questions: [QUESTION] },
      { headers: { Authorization: "Bearer not-the-token" } }
    );

    expect([missing.status, missing.data]).toEqual([401, { message: "Token Not Received" }]);
    expect([wrong.status, wrong.data]).toEqual([401, { message: "Invalid Token" }]);
  });

  it("should refuse protected routes when no token is configured", async () => {
    const { client } = await start({ API_TOKEN: undefined });

    const res = await client.get("/stats", { headers: { Authorization: "Bearer anything" } });

    expect(res.status).toBe(503);
  });

  it("should reject a malformed body with the validator errors", async () => {
    const { client, authed } = await start();

    const run = (body: unknown) => client.post<ValidationErrors>("/hackrx/run", body, authed);
    const blank = await run({ documents: "  ", questions: [QUESTION] });
    const badQuestion = await run({ documents: DOC_URL, questions: [42] });
    const noQuestions = await run({ documents: DOC_URL, questions: [] });

    expect(blank.status).toBe(422);
    expect(blank.data.errors.map((e) => [e.path, e.msg])).toEqual([
      ["documents", "documents is required"],
    ]);
    expect(badQuestion.data.errors[0].msg).toBe("Each question must be a string");
    expect(noQuestions.data.errors[0].msg).toBe("questions must be a non-empty array");
  });

  it("should answer 400 to invalid JSON", async () => {
    const { client, authed } = await start();

    const res = await client.post("/hackrx/run", "{not json", {
      headers: { ...authed.headers, "Content-Type": "application/json" },
    });

    expect(res.status).toBe(400);
  });

  it("should map a document that cannot be loaded to 422", async () => {
    const { client, authed } = await start(
      {},
      {
        loader: {
          load: async () => {
            throw new DocumentIngestionFailedError("Document download failed with HTTP 404");
          },
        },
      }
    );

    const res = await client.post("/hackrx/run", { documents: DOC_URL, questions: [QUESTION] }, authed);

    expect(res.status).toBe(422);
    expect(res.data).toEqual({
      message: "Document download failed with HTTP 404",
      code: "DOCUMENT_INGESTION_FAILED",
    });
  });

  it("should answer 500 with an error id when indexing fails", async () => {
    const { client, authed, embedding } = await start();
    embedding.failures = [new EmbeddingUnavailableError("embedder down")];

    const res = await client.post<{ message: string; errorId: string }>(
      "/hackrx/run",
      { documents: DOC_URL, questions: [QUESTION] },
      authed
    );

    expect(res.status).toBe(500);
    expect(res.data.message).toBe("Internal Server Error");
    expect(res.data.errorId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("should invalidate a document", async () => {
    const { client, authed } = await start();
    const { documentId } = documentFromText(TEXT);
    await client.post("/hackrx/run", { documents: DOC_URL, questions: [QUESTION] }, authed);

    const res = await client.delete(`/documents/${documentId}`, authed);
    const bad = await client.delete("/documents/not-a-hash", authed);

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ documentId, indexEvicted: true, answersRemoved: 1 });
    expect(bad.status).toBe(422);
  });

  it("should expose performance stats", async () => {
    const { client, authed } = await start();
    await client.post("/hackrx/run", { documents: DOC_URL, questions: [QUESTION, QUESTION] }, authed);

    const res = await client.get("/stats", authed);

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({
      cache: { hits: 1, misses: 1, hitRate: 0.5 },
      failedQuestions: 0,
      indexedDocuments: 1,
      cachedAnswers: 1,
    });
  });

  it("should block origins outside the allow-list", async () => {
    const { client } = await start({ CORS_ORIGINS: "http://localhost:5173" });

    const blocked = await client.get("/health", { headers: { Origin: "https://evil.test" } });
    const allowed = await client.get("/health", { headers: { Origin: "http://localhost:5173" } });

    expect(blocked.status).toBe(403);
    expect(blocked.data).toEqual({ message: "CORS Error: This origin is not allowed." });
    expect(allowed.status).toBe(200);
    expect(allowed.headers["access-control-allow-origin"]).toBe("http://localhost:5173");
  });

  it("should answer a blocked origin on a protected route with JSON", async () => {
    const { client, authed } = await start({ CORS_ORIGINS: "http://localhost:5173" });

    const res = await client.post(
      "/hackrx/run",
      { documents: DOC_URL, questions: [QUESTION] },
      { headers: { ...authed.headers, Origin: "https://evil.test" } }
    );

    expect(res.status).toBe(403);
    expect(res.data).toEqual({ message: "CORS Error: This origin is not allowed." });
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("should answer 404 for unknown routes", async () => {
    const { client } = await start();
    expect((await client.get("/nope")).status).toBe(404);
  });
});
