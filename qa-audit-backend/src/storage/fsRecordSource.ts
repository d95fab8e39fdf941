// qa-audit-backend/src/storage/fsRecordSource.ts

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  ConnectivityError,
  NotFoundError,
  RecordConflictError,
  ValidationError,
} from "../errors";
import { isAuditDocumentName, RecordHandle, RecordSource } from "./recordSource";

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/**
 * Un file JSON per audit in una cartella locale
 */
export class FsRecordSource implements RecordSource {
  readonly kind = "fs";

  constructor(private readonly directory: string) {}

  private resolve(name: string): string {
    const target = path.resolve(this.directory, name);
    if (path.dirname(target) !== path.resolve(this.directory)) {
      throw new ValidationError(`Nome record non valido: ${name}`);
    }
    return target;
  }

  async list(): Promise<RecordHandle[]> {
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && isAuditDocumentName(e.name))
        .map((e) => ({ name: e.name }))
        .sort((a, b) => a.name.localeCompare(b.name));
    } catch (err) {
      // cartella non ancora creata = nessun record
      if (errorCode(err) === "ENOENT") return [];
      throw new ConnectivityError(`Cartella record non leggibile: ${this.directory}`, {
        cause: err,
      });
    }
  }

  async readText(handle: RecordHandle): Promise<string> {
    try {
      return await readFile(this.resolve(handle.name), "utf-8");
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      if (errorCode(err) === "ENOENT") {
        throw new NotFoundError(`Record non trovato: ${handle.name}`);
      }
      throw new ConnectivityError(`Lettura record fallita: ${handle.name}`, {
        cause: err,
      });
    }
  }

  async append(name: string, content: string): Promise<void> {
    const target = this.resolve(name);
    try {
      await mkdir(this.directory, { recursive: true });
      // "wx": mai sovrascrivere un record esistente
      await writeFile(target, content, { encoding: "utf-8", flag: "wx" });
    } catch (err) {
      if (errorCode(err) === "EEXIST") {
        throw new RecordConflictError(name);
      }
      throw new ConnectivityError(`Scrittura record fallita: ${name}`, {
        cause: err,
      });
    }
  }
}
