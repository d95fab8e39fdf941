// qa-audit-backend/src/app.ts

import express from "express";
import cors from "cors";
import type { AppConfig } from "./config";
import { createAuditRouter } from "./routes/audits";
import { createReportsRouter } from "./routes/reports";
import { AuditWorkflow, SessionStore } from "./services/auditSession";
import type { RecordSource } from "./storage/recordSource";

export const SERVICE_NAME = "qa-audit-backend";

export interface AppDeps {
  config: Pick<AppConfig, "allowedOrigins" | "sessionTtlMs">;
  workflow: AuditWorkflow;
  source: RecordSource;
  sessions?: SessionStore;    // default: store in memoria con TTL da config
}

export function createApp({ config, workflow, source, sessions }: AppDeps): express.Express {
  const app = express();
  const sessionStore = sessions ?? new SessionStore(config.sessionTtlMs);

  // Configurazione CORS
  app.use(
    cors({
      origin: (origin, callback) => {
        // Permetti richieste senza origin (es. curl, Postman)
        if (!origin) {
          return callback(null, true);
        }
        if (config.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        console.warn(`[CORS] Origine bloccata: ${origin}`);
        return callback(new Error("Non autorizzato da CORS policy"), false);
      },
      credentials: true,
    })
  );

  app.use(express.json({ limit: "1mb" }));

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      recordStore: source.kind,
      timestamp: new Date().toISOString(),
    });
  });

  // Mount routes
  app.use("/api", createAuditRouter(workflow, sessionStore));
  app.use("/api", createReportsRouter(source));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      ok: false,
      error: "Endpoint non trovato",
    });
  });

  // Error handler globale (JSON malformato, CORS, errori non gestiti)
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: "Body JSON non valido" });
      return;
    }
    console.error(`[${new Date().toISOString()}] Errore non gestito:`, err.message);
    res.status(500).json({
      ok: false,
      error: "Errore interno del server",
    });
  });

  return app;
}
