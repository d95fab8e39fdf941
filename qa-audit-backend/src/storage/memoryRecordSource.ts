// qa-audit-backend/src/storage/memoryRecordSource.ts

import { ConnectivityError, NotFoundError, RecordConflictError } from "../errors";
import { isAuditDocumentName, RecordHandle, RecordSource } from "./recordSource";

/**
 * Record source in memoria (test e demo locali).
 * `offline` simula uno storage non raggiungibile.
 */
export class MemoryRecordSource implements RecordSource {
  readonly kind = "memory";
  offline = false;
  private readonly objects = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, content] of Object.entries(initial)) {
      this.objects.set(name, content);
    }
  }

  private ensureOnline(): void {
    if (this.offline) {
      throw new ConnectivityError("Record store in memoria offline");
    }
  }

  async list(): Promise<RecordHandle[]> {
    this.ensureOnline();
    return [...this.objects.keys()]
      .filter(isAuditDocumentName)
      .map((name) => ({ name }));
  }

  async readText(handle: RecordHandle): Promise<string> {
    this.ensureOnline();
    const content = this.objects.get(handle.name);
    if (content === undefined) {
      throw new NotFoundError(`Record non trovato: ${handle.name}`);
    }
    return content;
  }

  async append(name: string, content: string): Promise<void> {
    this.ensureOnline();
    if (this.objects.has(name)) {
      throw new RecordConflictError(name);
    }
    this.objects.set(name, content);
  }

  get size(): number {
    return this.objects.size;
  }
}
