import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.env).toBe("development");
    expect(config.recordStore).toBe("fs");
    expect(config.allowedOrigins).toEqual(["http://localhost:3000"]);
    expect(config.sessionTtlMs).toBe(480 * 60_000);
    expect(path.basename(config.rulesCsv)).toBe("scoring_rules.csv");
    expect(path.basename(config.employeesCsv)).toBe("employee_data.csv");
    expect(config.gcsBucket).toBeUndefined();
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      ALLOWED_ORIGINS: "https://qa.example.com, http://localhost:5173 ,",
      RECORD_STORE: "gcs",
      GCS_BUCKET: " qa-audit-records ",
      SESSION_TTL_MINUTES: "30",
    });
    expect(config.port).toBe(8080);
    expect(config.allowedOrigins).toEqual(["https://qa.example.com", "http://localhost:5173"]);
    expect(config.recordStore).toBe("gcs");
    expect(config.gcsBucket).toBe("qa-audit-records");
    expect(config.sessionTtlMs).toBe(1_800_000);
  });

  it("requires a bucket for the gcs store", () => {
    expect(() => loadConfig({ RECORD_STORE: "gcs" })).toThrow(
      "Configurazione non valida - GCS_BUCKET: obbligatorio con RECORD_STORE=gcs"
    );
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Configurazione non valida - PORT: /);
    expect(() => loadConfig({ RECORD_STORE: "s3" })).toThrow(/RECORD_STORE/);
  });
});
