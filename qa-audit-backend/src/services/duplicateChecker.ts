// qa-audit-backend/src/services/duplicateChecker.ts

import { ParseError, ValidationError } from "../errors";
import type { RecordSource } from "../storage/recordSource";
import {
  ASSOCIATE_EMAIL_FIELDS,
  ENTITY_ID_FIELDS,
  readStoredRecord,
  readText,
  type StoredDocument,
} from "./auditRecords";

export function normalizeKeyPart(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Esiste già un audit con lo stesso Entity ID E la stessa email associate?
 * Confronto case-insensitive con trim. Stesso ticket su associate diversi
 * non è un duplicato.
 *
 * Record non leggibili vengono ignorati; se il source non risponde
 * l'errore (ConnectivityError) arriva al chiamante: mai un false silenzioso.
 */
export async function isDuplicate(
  ticketId: string,
  associateEmail: string,
  source: RecordSource
): Promise<boolean> {
  const ticket = normalizeKeyPart(ticketId);
  const email = normalizeKeyPart(associateEmail);
  if (!ticket || !email) {
    throw new ValidationError(
      "Entity ID ed email associate sono richiesti per il controllo duplicati"
    );
  }

  const handles = await source.list();
  for (const handle of handles) {
    let data: StoredDocument;
    try {
      data = (await readStoredRecord(source, handle)).data;
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      console.warn(
        `[${new Date().toISOString()}] duplicate-check - record ignorato: ${err.message}`
      );
      continue;
    }

    if (
      normalizeKeyPart(readText(data, ENTITY_ID_FIELDS)) === ticket &&
      normalizeKeyPart(readText(data, ASSOCIATE_EMAIL_FIELDS)) === email
    ) {
      return true;
    }
  }
  return false;
}
