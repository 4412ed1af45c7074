import OpenAI from "openai";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

export interface OpenAISingleton {
  client: OpenAI;
}

let singleton: OpenAISingleton | null = null;

export class OpenAIConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OpenAIConfigError";
  }
}

function initialize(): OpenAISingleton {
  if (!config.OPENAI_API_KEY) {
    throw new OpenAIConfigError("OPENAI_API_KEY is missing.");
  }

  // Retries and per-call timeouts are applied by the provider wrapper.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: config.PROVIDER_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { embedding_model: config.OPENAI_EMBEDDING_MODEL, model: config.OPENAI_MODEL });

  return { client };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
