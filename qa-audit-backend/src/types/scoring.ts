// qa-audit-backend/src/types/scoring.ts
// Rule table e risultati del motore di scoring

/**
 * Sotto-motivo sempre presente su ogni parametro (deduzione 0, non fatale),
 * anche se non compare nella configurazione
 */
export const COMPLIANT = "Compliant";

/**
 * Singola voce della rule table
 */
export interface ScoringRule {
  subReason: string;
  deduction: number;   // >= 0
  fatal: boolean;
}

/**
 * Parametro di audit con il suo punteggio massimo
 * - fatalOnDeviation: qualsiasi selezione diversa da {Compliant} rende l'audit fatale
 */
export interface ParameterDefinition {
  name: string;
  maxScore: number;
  fatalOnDeviation: boolean;
  rules: ScoringRule[];   // ordine solo per la visualizzazione
}

export interface RuleTable {
  parameters: ParameterDefinition[];
}

/**
 * Motivi selezionati dall'auditor, per nome parametro.
 * Parametri assenti = {Compliant}
 */
export type ReasonSelections = Record<string, string[]>;

export interface ParameterResult {
  parameter: string;
  selectedReasons: string[];
  score: number;
  maxScore: number;
  fatal: boolean;   // questo parametro ha attivato il fatal
}

export type ScoreTag = "ZTP" | "Fatal";

export interface ScoringResult {
  parameterResults: ParameterResult[];
  totalScore: number;
  maxTotalScore: number;
  ztpViolation: boolean;
  fatalError: boolean;
  displayedScore: number;
  tag: ScoreTag | null;
}
