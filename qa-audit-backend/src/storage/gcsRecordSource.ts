// qa-audit-backend/src/storage/gcsRecordSource.ts

import { Bucket, Storage } from "@google-cloud/storage";
import { ConnectivityError, NotFoundError, RecordConflictError } from "../errors";
import { isAuditDocumentName, RecordHandle, RecordSource } from "./recordSource";

function statusCode(err: unknown): number | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "number" ? err.code : undefined;
  }
  return undefined;
}

export interface GcsRecordSourceOptions {
  bucketName: string;
  keyFilename?: string;   // senza chiave: Application Default Credentials
}

/**
 * Un oggetto JSON per audit in un bucket Google Cloud Storage
 */
export class GcsRecordSource implements RecordSource {
  readonly kind = "gcs";
  private readonly bucket: Bucket;

  constructor(options: GcsRecordSourceOptions) {
    const storage = new Storage(
      options.keyFilename ? { keyFilename: options.keyFilename } : {}
    );
    this.bucket = storage.bucket(options.bucketName);
  }

  async list(): Promise<RecordHandle[]> {
    try {
      const [files] = await this.bucket.getFiles();
      return files
        .filter((f) => isAuditDocumentName(f.name))
        .map((f) => ({ name: f.name }));
    } catch (err) {
      throw new ConnectivityError(
        `Bucket ${this.bucket.name} non raggiungibile`,
        { cause: err }
      );
    }
  }

  async readText(handle: RecordHandle): Promise<string> {
    try {
      const [contents] = await this.bucket.file(handle.name).download();
      return contents.toString("utf-8");
    } catch (err) {
      if (statusCode(err) === 404) {
        throw new NotFoundError(`Record non trovato: ${handle.name}`);
      }
      throw new ConnectivityError(`Download fallito: ${handle.name}`, {
        cause: err,
      });
    }
  }

  async append(name: string, content: string): Promise<void> {
    try {
      // ifGenerationMatch 0: l'upload fallisce se l'oggetto esiste già
      await this.bucket.file(name).save(content, {
        contentType: "application/json",
        resumable: false,
        preconditionOpts: { ifGenerationMatch: 0 },
      });
    } catch (err) {
      if (statusCode(err) === 412) {
        throw new RecordConflictError(name);
      }
      throw new ConnectivityError(`Upload fallito: ${name}`, { cause: err });
    }
  }
}
