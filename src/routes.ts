import type { FastifyInstance, FastifyRequest } from "fastify";
import fs from "node:fs";
import path from "node:path";

import { analyzeDocument, type Analyzer } from "./content_analysis.js";
import { badRequest } from "./errors.js";
import { buildAnalyzeRequestSchema, describeIssues } from "./validation.js";

export type RouteOptions = {
  maxContentChars: number;
  analyze?: Analyzer;
};

/* -----------------------------
   Routes
------------------------------ */

export async function registerRoutes(app: FastifyInstance, opts: RouteOptions) {
  const analyze = opts.analyze ?? analyzeDocument;
  const AnalyzeRequestSchema = buildAnalyzeRequestSchema(opts.maxContentChars);

  // Deterministic error responses
  app.setErrorHandler((error, req, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      req.log.error({ err: error }, "request failed");
      reply.code(500).send({ error: "internal_error", message: error.message });
      return;
    }
    reply.code(status).send({ error: "bad_request", message: error.message });
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/", async () => ({
    ok: true,
    service: "draft-analyzer",
    endpoints: ["/health", "/openapi.yaml", "/v1/analyze", "/analyze"]
  }));

  app.get("/openapi.yaml", async (_req, reply) => {
    const p = path.join(process.cwd(), "openapi.yaml");
    if (!fs.existsSync(p)) {
      reply.code(404).type("application/json").send({ error: "not_found" });
      return;
    }
    const yml = fs.readFileSync(p, "utf8");
    reply.type("text/yaml").send(yml);
  });

  const analyzeHandler = async (req: FastifyRequest) => {
    const parsed = AnalyzeRequestSchema.safeParse(req.body);
    if (!parsed.success) badRequest(`Invalid analysis request: ${describeIssues(parsed.error)}`);

    const result = analyze(parsed.data);

    req.log.debug(
      {
        word_count: result.stats.word_count,
        sentence_count: result.stats.sentence_count,
        suggestion_count: result.suggestions.length
      },
      "draft analyzed"
    );

    return result;
  };

  app.post("/v1/analyze", analyzeHandler);
  // unversioned alias
  app.post("/analyze", analyzeHandler);
}
