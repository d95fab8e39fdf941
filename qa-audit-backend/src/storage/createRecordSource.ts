// qa-audit-backend/src/storage/createRecordSource.ts

import type { AppConfig } from "../config";
import { FsRecordSource } from "./fsRecordSource";
import { GcsRecordSource } from "./gcsRecordSource";
import { MemoryRecordSource } from "./memoryRecordSource";
import type { RecordSource } from "./recordSource";

export function createRecordSource(config: AppConfig): RecordSource {
  switch (config.recordStore) {
    case "gcs":
      if (!config.gcsBucket) {
        throw new Error("GCS_BUCKET non configurato");
      }
      return new GcsRecordSource({
        bucketName: config.gcsBucket,
        keyFilename: config.gcsKeyFile,
      });
    case "fs":
      return new FsRecordSource(config.recordsDir);
    case "memory":
      return new MemoryRecordSource();
  }
}
