import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { diagnose, FetchError, rankRecommendations } from "./diagnosis";
import type { Logger } from "./diagnosis";

const DiagnoseRequestSchema = z.object({
  url: z.string().min(1),
  timeoutMs: z.coerce.number().int().positive().optional(),
  tlsTimeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().optional(),
});

export interface RouteDependencies {
  diagnose: typeof diagnose;
  logger?: Logger;
}

function fetchErrorStatus(error: FetchError): number {
  switch (error.kind) {
    case "invalid-url":
      return 400;
    case "blocked":
      return 403;
    default:
      return 502;
  }
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  deps: RouteDependencies = { diagnose }
): Promise<Server> {
  app.post("/api/diagnose", async (req: Request, res: Response) => {
    const parsed = DiagnoseRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request body",
        details: parsed.error.errors,
      });
      return;
    }

    const { url, ...options } = parsed.data;

    try {
      const result = await deps.diagnose(url, { ...options, logger: deps.logger });
      res.json({ result, recommendations: rankRecommendations(result) });
    } catch (error) {
      if (error instanceof FetchError) {
        res.status(fetchErrorStatus(error)).json({ error: true, message: error.message });
        return;
      }
      if (error instanceof z.ZodError) {
        res.status(400).json({ error: true, message: "Invalid diagnosis options", details: error.errors });
        return;
      }
      deps.logger?.error("Diagnosis failed unexpectedly", error);
      res.status(500).json({
        error: true,
        message: error instanceof Error && error.message ? error.message : "An error occurred during the diagnosis",
      });
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "site-diagnosis" });
  });

  return httpServer;
}
