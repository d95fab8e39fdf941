// qa-audit-backend/src/services/scoring.ts
// Deterministic Audit Scoring Engine

import { ValidationError } from "../errors";
import {
  COMPLIANT,
  ParameterDefinition,
  ParameterResult,
  ReasonSelections,
  RuleTable,
  ScoreTag,
  ScoringResult,
} from "../types/scoring";

// ============================================================
// SELECTION HELPERS
// ============================================================

function isCompliantLabel(reason: string): boolean {
  return reason.trim().toLowerCase() === COMPLIANT.toLowerCase();
}

/**
 * Pulisce la selezione: trim, rimozione duplicati, "compliant" canonico.
 * Selezione vuota → {Compliant}
 */
export function normalizeSelection(selected: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of selected) {
    const reason = isCompliantLabel(raw) ? COMPLIANT : raw.trim();
    if (reason && !out.includes(reason)) out.push(reason);
  }
  return out.length > 0 ? out : [COMPLIANT];
}

export function isOnlyCompliant(selected: readonly string[]): boolean {
  return selected.length === 1 && selected[0] === COMPLIANT;
}

export function findParameter(
  table: RuleTable,
  name: string
): ParameterDefinition | undefined {
  return table.parameters.find((p) => p.name === name);
}

// ============================================================
// SCORING FUNCTIONS
// ============================================================

/**
 * Score di un parametro
 * {Compliant} → maxScore
 * altrimenti maxScore - Σ deduzioni dei motivi non Compliant, minimo 0
 * Motivi sconosciuti → ValidationError
 */
export function computeParameterScore(
  parameter: ParameterDefinition,
  selected: readonly string[]
): { score: number; fatal: boolean } {
  const reasons = normalizeSelection(selected);
  if (isOnlyCompliant(reasons)) {
    return { score: parameter.maxScore, fatal: false };
  }

  let deductions = 0;
  let fatal = parameter.fatalOnDeviation;

  for (const reason of reasons) {
    if (reason === COMPLIANT) continue;
    const rule = parameter.rules.find((r) => r.subReason === reason);
    if (!rule) {
      throw new ValidationError(
        `Motivo "${reason}" non previsto per il parametro "${parameter.name}"`
      );
    }
    deductions += rule.deduction;
    if (rule.fatal) fatal = true;
  }

  return { score: Math.max(0, parameter.maxScore - deductions), fatal };
}

/**
 * Score mostrato: ZTP ha precedenza su Fatal, entrambi azzerano
 */
export function computeDisplayedScore(
  totalScore: number,
  fatalError: boolean,
  ztpViolation: boolean
): { displayedScore: number; tag: ScoreTag | null } {
  if (ztpViolation) return { displayedScore: 0, tag: "ZTP" };
  if (fatalError) return { displayedScore: 0, tag: "Fatal" };
  return { displayedScore: totalScore, tag: null };
}

// ============================================================
// MAIN BUILDER
// ============================================================

/**
 * Calcola lo scoring completo di un audit.
 * Ogni parametro della rule table produce un risultato, nell'ordine della tabella.
 */
export function scoreAudit(
  table: RuleTable,
  selections: ReasonSelections,
  ztpViolation: boolean
): ScoringResult {
  const unknown = Object.keys(selections).filter(
    (name) => !findParameter(table, name)
  );
  if (unknown.length > 0) {
    throw new ValidationError(
      `Parametri non previsti dalla rule table: ${unknown.join(", ")}`,
      unknown
    );
  }

  const parameterResults: ParameterResult[] = table.parameters.map((param) => {
    const selectedReasons = normalizeSelection(selections[param.name] ?? []);
    const { score, fatal } = computeParameterScore(param, selectedReasons);
    return {
      parameter: param.name,
      selectedReasons,
      score,
      maxScore: param.maxScore,
      fatal,
    };
  });

  const totalScore = parameterResults.reduce((sum, r) => sum + r.score, 0);
  const maxTotalScore = table.parameters.reduce((sum, p) => sum + p.maxScore, 0);
  const fatalError = parameterResults.some((r) => r.fatal);
  const { displayedScore, tag } = computeDisplayedScore(
    totalScore,
    fatalError,
    ztpViolation
  );

  return {
    parameterResults,
    totalScore,
    maxTotalScore,
    ztpViolation,
    fatalError,
    displayedScore,
    tag,
  };
}
