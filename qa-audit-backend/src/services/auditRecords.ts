// qa-audit-backend/src/services/auditRecords.ts
// Lettura tollerante dei documenti audit storici
//
// I record salvati nel tempo hanno forme diverse (campi assenti, rinominati,
// numeri come stringhe): ogni campo ha una regola di fallback esplicita.

import { z } from "zod";
import { NotFoundError, ParseError } from "../errors";
import type { RecordHandle, RecordSource } from "../storage/recordSource";
import { COMPLIANT } from "../types/scoring";
import { formatDay } from "./recordBuilder";

export const UNKNOWN = "Unknown";

const StoredDocumentSchema = z.record(z.string(), z.unknown());
export type StoredDocument = z.infer<typeof StoredDocumentSchema>;

export interface StoredRecord {
  name: string;
  data: StoredDocument;
}

export interface NormalizedParameter {
  parameter: string;
  score: number | null;
  reasons: string[];
}

export interface NormalizedAudit {
  name: string;
  auditId: string;
  auditDate: string | null;   // YYYY-MM-DD, null se assente/non valida
  entityId: string;
  associateEmail: string;
  associateName: string;
  teamLead: string;
  auditType: string;
  auditorName: string;
  totalScore: number | null;  // null se non numerico
  ztpViolation: boolean;
  fatalError: boolean;
  parameters: NormalizedParameter[];
}

// ============================================================
// FIELD READERS
// ============================================================

/**
 * Primo campo valorizzato (stringa non vuota o numero) tra i nomi alternativi
 */
export function readText(
  data: StoredDocument,
  keys: readonly string[],
  fallback = ""
): string {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "string" && value.trim() !== "") return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return fallback;
}

export function parseScore(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function isValidDay(day: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(day);
  if (!match) return false;
  const [year, month, date] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const d = new Date(Date.UTC(year, month - 1, date));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === date
  );
}

/**
 * Data audit → YYYY-MM-DD. Accetta anche "YYYY-MM-DD HH:MM:SS" e formati
 * leggibili da Date; il resto → null
 */
export function parseAuditDay(value: unknown): string | null {
  if (typeof value !== "string" || value.trim() === "") return null;
  const trimmed = value.trim();
  const prefix = trimmed.slice(0, 10);
  if (/^\d{4}-\d{2}-\d{2}/.test(trimmed)) {
    return isValidDay(prefix) ? prefix : null;
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : formatDay(parsed);
}

export function parseFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    return ["yes", "y", "true", "1"].includes(value.trim().toLowerCase());
  }
  return false;
}

export function isCompliantReason(reason: string): boolean {
  return reason.trim().toLowerCase() === COMPLIANT.toLowerCase();
}

/**
 * Motivi di un parametro: array, oppure stringa storica separata da virgole.
 * Nessun motivo → {Compliant}
 */
export function parseReasons(value: unknown): string[] {
  let reasons: string[] = [];
  if (Array.isArray(value)) {
    reasons = value
      .filter((r): r is string => typeof r === "string")
      .map((r) => r.trim());
  } else if (typeof value === "string") {
    reasons = value.split(",").map((r) => r.trim());
  }
  reasons = reasons
    .filter((r) => r !== "")
    .map((r) => (isCompliantReason(r) ? COMPLIANT : r));
  return reasons.length > 0 ? reasons : [COMPLIANT];
}

/**
 * "Parameters" può essere una lista o una lista serializzata come stringa.
 * Qualsiasi altra forma → nessuna riga
 */
export function parseParameters(value: unknown): NormalizedParameter[] {
  let list: unknown = value;
  if (typeof value === "string") {
    try {
      list = JSON.parse(value.replace(/'/g, '"'));
    } catch {
      return [];
    }
  }
  if (!Array.isArray(list)) return [];

  const out: NormalizedParameter[] = [];
  for (const item of list) {
    const parsed = StoredDocumentSchema.safeParse(item);
    if (!parsed.success) continue;
    const parameter = readText(parsed.data, ["Parameter"]);
    if (!parameter) continue;
    // versione raffinata prima, poi formato storico
    const reasonsField =
      parsed.data["Selected Reasons Scored"] ?? parsed.data["Selected Reasons"];
    out.push({
      parameter,
      score: parseScore(parsed.data["Score"]),
      reasons: parseReasons(reasonsField),
    });
  }
  return out;
}

export const ENTITY_ID_FIELDS = ["Entity ID", "Ticket ID", "Case ID"] as const;
export const ASSOCIATE_EMAIL_FIELDS = ["Associate Email ID", "Associate Email"] as const;

export function normalizeAuditRecord(record: StoredRecord): NormalizedAudit {
  const { data } = record;
  return {
    name: record.name,
    auditId: readText(data, ["Audit ID"], record.name.replace(/\.json$/i, "")),
    auditDate: parseAuditDay(data["Audit Date"]),
    entityId: readText(data, ENTITY_ID_FIELDS),
    associateEmail: readText(data, ASSOCIATE_EMAIL_FIELDS).toLowerCase(),
    associateName: readText(data, ["Associate Name"], UNKNOWN),
    teamLead: readText(data, ["Team Lead"], UNKNOWN),
    auditType: readText(data, ["Audit Type"], UNKNOWN),
    auditorName: readText(data, ["Auditor Name"], UNKNOWN),
    totalScore: parseScore(data["Total Score"]),
    ztpViolation: parseFlag(data["ZTP Violation"]),
    fatalError: parseFlag(data["Fatal Error"]),
    parameters: parseParameters(data["Parameters"]),
  };
}

// ============================================================
// LOADING
// ============================================================

export function parseStoredRecord(name: string, text: string): StoredRecord {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ParseError(
      name,
      `JSON non valido in ${name}: ${err instanceof Error ? err.message : err}`
    );
  }
  const parsed = StoredDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(name, `${name} non contiene un oggetto JSON`);
  }
  return { name, data: parsed.data };
}

export interface LoadedRecords {
  records: StoredRecord[];
  skipped: ParseError[];
}

/**
 * Legge un singolo record. Record illeggibili o spariti dopo il listing
 * → ParseError; errori di connettività propagati.
 */
export async function readStoredRecord(
  source: RecordSource,
  handle: RecordHandle
): Promise<StoredRecord> {
  let text: string;
  try {
    text = await source.readText(handle);
  } catch (err) {
    if (err instanceof NotFoundError) {
      throw new ParseError(handle.name, err.message);
    }
    throw err;
  }
  return parseStoredRecord(handle.name, text);
}

/**
 * Carica tutti i record del source. I record non validi vengono saltati
 * (warning) senza interrompere il caricamento.
 */
export async function loadStoredRecords(source: RecordSource): Promise<LoadedRecords> {
  const handles = await source.list();
  const records: StoredRecord[] = [];
  const skipped: ParseError[] = [];

  for (const handle of handles) {
    try {
      records.push(await readStoredRecord(source, handle));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      console.warn(
        `[${new Date().toISOString()}] record saltato - ${err.message}`
      );
      skipped.push(err);
    }
  }

  return { records, skipped };
}
