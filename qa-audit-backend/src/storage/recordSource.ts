// qa-audit-backend/src/storage/recordSource.ts
// Contratto dello storage dei record audit (append-only)

export interface RecordHandle {
  name: string;
}

/**
 * Storage condiviso: si può solo elencare, leggere e aggiungere.
 * Ogni metodo può fallire con ConnectivityError o NotFoundError.
 */
export interface RecordSource {
  readonly kind: string;
  list(): Promise<RecordHandle[]>;
  readText(handle: RecordHandle): Promise<string>;
  append(name: string, content: string): Promise<void>;
}

/**
 * Solo documenti .json; esclusi nomi nascosti e "cartelle"
 */
export function isAuditDocumentName(name: string): boolean {
  if (!name || name.startsWith(".") || name.endsWith("/")) return false;
  const base = name.slice(name.lastIndexOf("/") + 1);
  return !base.startsWith(".") && name.toLowerCase().endsWith(".json");
}
