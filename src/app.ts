import Fastify, { type FastifyInstance } from "fastify";

import type { AppConfig } from "./config.js";
import type { Analyzer } from "./content_analysis.js";
import { registerRoutes } from "./routes.js";

export type AppOptions = {
  config: AppConfig;
  /** false silences request logging (tests) */
  logger?: boolean;
  analyze?: Analyzer;
};

export async function buildApp({ config, logger = true, analyze }: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: logger
      ? {
          level: config.logLevel,
          transport: config.nodeEnv !== "production"
            ? { target: "pino-pretty" }
            : undefined
        }
      : false,
    bodyLimit: config.bodyLimitBytes
  });

  await registerRoutes(app, { maxContentChars: config.maxContentChars, analyze });
  return app;
}
