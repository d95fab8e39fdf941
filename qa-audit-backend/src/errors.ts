// qa-audit-backend/src/errors.ts
// Tassonomia errori del backend audit

/**
 * Base di tutti gli errori applicativi: porta lo status HTTP
 * e se il chiamante può riprovare l'operazione
 */
export class AuditError extends Error {
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, status: number, retryable = false) {
    super(message);
    this.name = "AuditError";
    this.status = status;
    this.retryable = retryable;
  }
}

/**
 * Campo del form mancante o non valido: l'operazione non viene tentata
 */
export class ValidationError extends AuditError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends AuditError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

/**
 * Violazione della regola di unicità (Entity ID, email associate)
 */
export class DuplicateError extends AuditError {
  readonly entityId: string;
  readonly associateEmail: string;

  constructor(entityId: string, associateEmail: string) {
    super(
      `Audit già presente per Entity ID "${entityId}" e associate "${associateEmail}"`,
      409
    );
    this.name = "DuplicateError";
    this.entityId = entityId;
    this.associateEmail = associateEmail;
  }
}

/**
 * Record source non raggiungibile. Nessun retry interno: decide il chiamante.
 */
export class ConnectivityError extends AuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, true);
    this.name = "ConnectivityError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Nome record già occupato (collisione di Audit ID): nessun dato dell'utente
 * è sbagliato, il chiamante può riprovare con un nuovo ID
 */
export class RecordConflictError extends AuditError {
  readonly recordName: string;

  constructor(recordName: string) {
    super(`Record già esistente: ${recordName}`, 409, true);
    this.name = "RecordConflictError";
    this.recordName = recordName;
  }
}

/**
 * Singolo record salvato non interpretabile. Non interrompe le aggregazioni.
 */
export class ParseError extends Error {
  readonly recordName: string;

  constructor(recordName: string, message: string) {
    super(message);
    this.name = "ParseError";
    this.recordName = recordName;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Errore sconosciuto";
}
