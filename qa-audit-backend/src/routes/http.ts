// qa-audit-backend/src/routes/http.ts
// Envelope di risposta e mapping errori → status HTTP

import type { Response } from "express";
import { z } from "zod";
import { AuditError, ValidationError, errorMessage } from "../errors";

export interface OkResponse<T> {
  ok: true;
  data: T;
}

export interface ErrorResponse {
  ok: false;
  error: string;
  issues?: string[];
  retryable?: boolean;
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (error instanceof AuditError) {
    const body: ErrorResponse = { ok: false, error: error.message };
    if (error instanceof ValidationError && error.issues.length > 0) {
      body.issues = error.issues;
    }
    if (error.retryable) body.retryable = true;
    return { status: error.status, body };
  }
  return {
    status: 500,
    body: { ok: false, error: "Errore interno del server" },
  };
}

/**
 * Log della richiesta completata: `[timestamp] METHOD path - Completato in Nms`
 */
export function logCompleted(route: string, startTime: number): void {
  console.log(
    `[${new Date().toISOString()}] ${route} - Completato in ${Date.now() - startTime}ms`
  );
}

export function sendOk<T>(
  res: Response,
  route: string,
  startTime: number,
  data: T,
  status = 200
): void {
  logCompleted(route, startTime);
  const body: OkResponse<T> = { ok: true, data };
  res.status(status).json(body);
}

export function sendError(res: Response, route: string, startTime: number, error: unknown): void {
  const duration = Date.now() - startTime;
  const { status, body } = toErrorResponse(error);
  const log = status >= 500 ? console.error : console.warn;
  log(
    `[${new Date().toISOString()}] ${route} - Errore ${status} dopo ${duration}ms:`,
    errorMessage(error)
  );
  res.status(status).json(body);
}

/**
 * Validazione input con zod → ValidationError con l'elenco dei problemi
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      `${what} non valido`,
      parsed.error.issues.map((i) => `${i.path.join(".") || what}: ${i.message}`)
    );
  }
  return parsed.data;
}
