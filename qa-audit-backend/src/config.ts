// qa-audit-backend/src/config.ts
// Configurazione da variabili d'ambiente (validate con zod)

import path from "node:path";
import { z } from "zod";

const DATA_DIR = path.resolve(__dirname, "..", "data");

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.string().default("development"),
    ALLOWED_ORIGINS: z.string().optional(),
    RECORD_STORE: z.enum(["gcs", "fs", "memory"]).default("fs"),
    GCS_BUCKET: z.string().trim().optional(),
    GCS_KEY_FILE: z.string().trim().optional(),
    RECORDS_DIR: z.string().default(path.resolve(process.cwd(), "audit-records")),
    RULES_CSV: z.string().default(path.join(DATA_DIR, "scoring_rules.csv")),
    EMPLOYEES_CSV: z.string().default(path.join(DATA_DIR, "employee_data.csv")),
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(480),
  })
  .superRefine((env, ctx) => {
    if (env.RECORD_STORE === "gcs" && !env.GCS_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GCS_BUCKET"],
        message: "obbligatorio con RECORD_STORE=gcs",
      });
    }
  });

export type RecordStoreKind = "gcs" | "fs" | "memory";

export interface AppConfig {
  port: number;
  env: string;
  allowedOrigins: string[];
  recordStore: RecordStoreKind;
  gcsBucket?: string;
  gcsKeyFile?: string;
  recordsDir: string;
  rulesCsv: string;
  employeesCsv: string;
  sessionTtlMs: number;
}

/**
 * Legge la configurazione; variabili non valide → errore con l'elenco dei nomi
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Configurazione non valida - ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    env: e.NODE_ENV,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean)
      : ["http://localhost:3000"],
    recordStore: e.RECORD_STORE,
    gcsBucket: e.GCS_BUCKET || undefined,
    gcsKeyFile: e.GCS_KEY_FILE || undefined,
    recordsDir: e.RECORDS_DIR,
    rulesCsv: e.RULES_CSV,
    employeesCsv: e.EMPLOYEES_CSV,
    sessionTtlMs: e.SESSION_TTL_MINUTES * 60_000,
  };
}
