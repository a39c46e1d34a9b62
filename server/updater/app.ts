import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { timingSafeEqual } from "node:crypto";
import { z, ZodError } from "zod";

import type { UpdaterServerConfig } from "./config.js";
import { UpdaterError, toErrorMessage } from "./errors.js";
import type { UpdaterControl } from "./service.js";

const resetRequestSchema = z.object({
  confirm: z.literal("reset")
});

const pruneRequestSchema = z.object({
  keep: z.number().int().min(0).max(1000).optional()
});

const restoreRequestSchema = z.object({
  path: z.string().trim().min(1).max(4096),
  confirm: z.literal("yes")
});

function extractBearerToken(value: string | undefined): string {
  if (!value) {
    return "";
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return "";
  }

  const match = trimmed.match(/^bearer\s+(.+)$/i);
  if (match?.[1]) {
    return match[1].trim();
  }

  return trimmed;
}

function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}

function createAuthMiddleware(authToken: string) {
  const expected = authToken.trim();

  return (request: Request, response: Response, next: NextFunction) => {
    if (request.path === "/health" || request.method === "OPTIONS") {
      next();
      return;
    }

    const bearer = extractBearerToken(
      typeof request.headers.authorization === "string" ? request.headers.authorization : undefined
    );
    const xApiToken = typeof request.headers["x-api-token"] === "string"
      ? request.headers["x-api-token"].trim()
      : "";
    const candidate = bearer || xApiToken;

    if (expected.length === 0 || candidate.length === 0 || !constantTimeEquals(candidate, expected)) {
      response.status(401).json({ error: "Unauthorized" });
      return;
    }

    next();
  };
}

function createCorsMiddleware(config: UpdaterServerConfig) {
  return cors({
    origin: (origin, callback) => {
      if (!origin || config.allowAnyCorsOrigin || config.corsOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(null, false);
    },
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-token"],
    credentials: false,
    maxAge: 600
  });
}

function handleRouteError(response: Response, error: unknown): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
    return;
  }

  if (error instanceof UpdaterError) {
    response.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  console.error("[api-error]", error);
  response.status(500).json({ error: toErrorMessage(error) });
}

export function createUpdaterApp(config: UpdaterServerConfig, service: UpdaterControl): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createCorsMiddleware(config));
  app.use(express.json({ limit: "64kb" }));
  app.use(createAuthMiddleware(config.authToken));

  app.get("/health", (_request, response) => {
    response.json({
      ok: true,
      now: new Date().toISOString()
    });
  });

  app.get("/api/updates/status", async (_request, response) => {
    try {
      response.json({
        status: await service.getStatus()
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.post("/api/updates/run", async (_request, response) => {
    try {
      const result = await service.runUpdate();
      response.status(result.success ? 200 : 500).json({ result });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.post("/api/updates/reset", async (request, response) => {
    try {
      resetRequestSchema.parse(request.body ?? {});
      response.json({
        state: await service.requestStateReset()
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.delete("/api/updates/reset", async (_request, response) => {
    try {
      response.json({
        state: await service.cancelStateReset()
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.get("/api/snapshots", async (_request, response) => {
    try {
      response.json({
        snapshots: await service.listSnapshots()
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.post("/api/snapshots/prune", async (request, response) => {
    try {
      const input = pruneRequestSchema.parse(request.body ?? {});
      response.json({
        removed: await service.pruneSnapshots(input.keep)
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.get("/api/backups", async (_request, response) => {
    try {
      response.json({
        backups: await service.listBackups()
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.post("/api/backups", async (_request, response) => {
    try {
      response.status(201).json({
        backup: await service.createBackup()
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.post("/api/backups/restore", async (request, response) => {
    try {
      const input = restoreRequestSchema.parse(request.body ?? {});
      response.json({
        restore: await service.restoreBackup(input.path, { confirmed: true })
      });
    } catch (error) {
      handleRouteError(response, error);
    }
  });

  app.use((_request, response) => {
    response.status(404).json({ error: "Not found" });
  });

  return app;
}
