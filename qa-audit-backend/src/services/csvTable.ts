// qa-audit-backend/src/services/csvTable.ts
// Lettura tabelle di riferimento (CSV con intestazione) validate con zod

import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ValidationError } from "../errors";

export const YES_VALUES = ["yes", "y", "true", "1"];
export const NO_VALUES = ["no", "n", "false", "0", ""];

/**
 * Cella Yes/No (vuota = No)
 */
export const flagCell = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const v = (value ?? "").trim().toLowerCase();
    if (YES_VALUES.includes(v)) return true;
    if (NO_VALUES.includes(v)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `valore Yes/No atteso, trovato "${value}"`,
    });
    return z.NEVER;
  });

export const numberCell = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "numero >= 0 atteso")
  .transform(Number);

/**
 * Numero >= 0, cella vuota = 0
 */
export const optionalNumberCell = z.preprocess(
  (v) => (v === undefined || (typeof v === "string" && v.trim() === "") ? "0" : v),
  numberCell
);

export const textCell = z
  .string()
  .optional()
  .transform((v) => (v ?? "").trim());

/**
 * Parsing CSV + validazione riga per riga.
 * Le righe non valide vengono riportate tutte insieme (numero di riga del file).
 */
export function parseCsvTable<T extends z.ZodTypeAny>(
  text: string,
  rowSchema: T,
  tableName: string
): Array<z.output<T>> {
  let rows: unknown;
  try {
    rows = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (err) {
    throw new ValidationError(
      `${tableName}: CSV non leggibile (${err instanceof Error ? err.message : err})`
    );
  }

  if (!Array.isArray(rows)) {
    throw new ValidationError(`${tableName}: CSV non leggibile`);
  }

  const parsed: Array<z.output<T>> = [];
  const issues: string[] = [];

  rows.forEach((row: unknown, index: number) => {
    const result = rowSchema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      // +2: intestazione e numerazione da 1
      const details = result.error.issues
        .map((i) => `${i.path.join(".") || "riga"}: ${i.message}`)
        .join("; ");
      issues.push(`riga ${index + 2}: ${details}`);
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(`${tableName}: righe non valide`, issues);
  }

  return parsed;
}

export async function readCsvTable<T extends z.ZodTypeAny>(
  filePath: string,
  rowSchema: T,
  tableName: string
): Promise<Array<z.output<T>>> {
  const text = await readFile(filePath, "utf-8");
  return parseCsvTable(text, rowSchema, tableName);
}
