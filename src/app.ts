import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { shutdownOpenAIClient } from "./clients/openai.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerApiRoutes } from "./api/routes/index.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";
import { createRuntime, type RetrievalRuntime } from "./runtime.js";

export interface BuildAppOptions {
  runtime?: RetrievalRuntime;
  logger?: boolean;
}

export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(
    configured && configured.length > 0 ? configured : ["http://localhost:5173", "http://127.0.0.1:5173"]
  );

  for (const origin of [...origins]) {
    if (!URL.canParse(origin)) {
      continue;
    }
    const url = new URL(origin);
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export async function buildApp(options?: BuildAppOptions): Promise<{ app: FastifyInstance; runtime: RetrievalRuntime }> {
  const app = Fastify({ logger: options?.logger ?? true });
  const runtime = options?.runtime ?? createRuntime();

  await app.register(cors, {
    origin: buildAllowedFrontendOrigins(process.env.FRONTEND_ORIGIN),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  app.addHook("onClose", async () => {
    await shutdownOpenAIClient();
  });
  await registerHealthRoute(app, { store: runtime.store });
  await registerMetricsRoutes(app);
  await registerApiRoutes(app, {
    search: { answers: runtime.answers },
    corpus: { runtime }
  });

  return { app, runtime };
}
