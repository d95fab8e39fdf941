// qa-audit-backend/src/services/ruleTable.ts
// Caricamento rule table di scoring da CSV

import { z } from "zod";
import { ValidationError } from "../errors";
import { COMPLIANT, ParameterDefinition, RuleTable } from "../types/scoring";
import {
  flagCell,
  numberCell,
  optionalNumberCell,
  parseCsvTable,
  readCsvTable,
  textCell,
} from "./csvTable";

const TABLE_NAME = "scoring rules";

/**
 * Colonne: Parameter, Max Score, Sub Reason, Deduction, Fatal, Fatal Parameter
 */
export const RuleRowSchema = z.object({
  Parameter: z.string().trim().min(1, "nome parametro obbligatorio"),
  "Max Score": numberCell,
  "Sub Reason": textCell,
  Deduction: optionalNumberCell,
  Fatal: flagCell,
  "Fatal Parameter": flagCell,
});

export type RuleRow = z.output<typeof RuleRowSchema>;

/**
 * Raggruppa le righe per parametro, nell'ordine di prima apparizione.
 * La riga "Compliant" (o con Sub Reason vuoto) dichiara solo il parametro.
 */
export function buildRuleTable(rows: RuleRow[]): RuleTable {
  const parameters: ParameterDefinition[] = [];
  const issues: string[] = [];

  for (const row of rows) {
    let param = parameters.find((p) => p.name === row.Parameter);
    if (!param) {
      param = {
        name: row.Parameter,
        maxScore: row["Max Score"],
        fatalOnDeviation: false,
        rules: [],
      };
      parameters.push(param);
    } else if (param.maxScore !== row["Max Score"]) {
      issues.push(
        `${row.Parameter}: Max Score incoerente (${param.maxScore} / ${row["Max Score"]})`
      );
    }

    if (row["Fatal Parameter"]) param.fatalOnDeviation = true;

    const subReason = row["Sub Reason"];
    if (!subReason || subReason.toLowerCase() === COMPLIANT.toLowerCase()) {
      continue;
    }
    if (param.rules.some((r) => r.subReason === subReason)) {
      issues.push(`${row.Parameter}: sotto-motivo duplicato "${subReason}"`);
      continue;
    }
    param.rules.push({
      subReason,
      deduction: row.Deduction,
      fatal: row.Fatal,
    });
  }

  if (issues.length > 0) {
    throw new ValidationError(`${TABLE_NAME}: configurazione incoerente`, issues);
  }
  if (parameters.length === 0) {
    throw new ValidationError(`${TABLE_NAME}: nessun parametro configurato`);
  }

  return { parameters };
}

export function parseRuleTable(csvText: string): RuleTable {
  return buildRuleTable(parseCsvTable(csvText, RuleRowSchema, TABLE_NAME));
}

export async function loadRuleTable(filePath: string): Promise<RuleTable> {
  return buildRuleTable(await readCsvTable(filePath, RuleRowSchema, TABLE_NAME));
}

/**
 * Motivi selezionabili per la UI, "Compliant" sempre in coda
 */
export function selectableReasons(param: ParameterDefinition): string[] {
  return [...param.rules.map((r) => r.subReason), COMPLIANT];
}
