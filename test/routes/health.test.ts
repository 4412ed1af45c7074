import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerHealthRoute } from "../../src/api/routes/health.js";
import { CorpusStore } from "../../src/modules/corpus/corpus-store.js";
import { sampleRecords } from "../helpers/fixtures.js";

const fetchHealth = async (store: CorpusStore) => {
  const app = Fastify();
  try {
    await registerHealthRoute(app, { store });
    const response = await app.inject({ method: "GET", url: "/health" });
    return { statusCode: response.statusCode, body: response.json() };
  } finally {
    await app.close();
  }
};

describe("registerHealthRoute", () => {
  it("reports starting before the first corpus load", async () => {
    const store = new CorpusStore({ logInfo: vi.fn() });

    await expect(fetchHealth(store)).resolves.toEqual({
      statusCode: 200,
      body: { status: "starting", corpus_version: null, semantic_ready: false }
    });
  });

  it("reports the loaded corpus version", async () => {
    const store = new CorpusStore({ logInfo: vi.fn() });
    await store.load(sampleRecords());

    await expect(fetchHealth(store)).resolves.toEqual({
      statusCode: 200,
      body: { status: "ok", corpus_version: 1, semantic_ready: false }
    });
  });
});
