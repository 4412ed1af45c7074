import type { FastifyInstance } from "fastify";
import { registerCorpusRoutes, type CorpusRoutesDependencies } from "./corpus.js";
import { registerSearchRoutes, type SearchRoutesDependencies } from "./search.js";

export interface ApiRoutesDependencies {
  search: SearchRoutesDependencies;
  corpus: CorpusRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies: ApiRoutesDependencies): Promise<void> {
  await registerSearchRoutes(app, dependencies.search);
  await registerCorpusRoutes(app, dependencies.corpus);
}
