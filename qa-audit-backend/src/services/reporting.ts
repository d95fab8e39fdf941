// qa-audit-backend/src/services/reporting.ts
// Aggregazioni per la dashboard, ricalcolate da zero a ogni lettura

import { ValidationError } from "../errors";
import { COMPLIANT } from "../types/scoring";
import {
  isValidDay,
  NormalizedAudit,
  normalizeAuditRecord,
  StoredRecord,
} from "./auditRecords";
import { normalizeKeyPart } from "./duplicateChecker";

// ============================================================
// TYPES
// ============================================================

export interface ReportFilters {
  from?: string;            // YYYY-MM-DD inclusivo
  to?: string;              // YYYY-MM-DD inclusivo
  associateName?: string;
  associateEmail?: string;
  teamLead?: string;
  auditType?: string;
  auditorName?: string;
}

export interface DateRange {
  from: string;
  to: string;
}

export interface ScoreSummary {
  totalAudits: number;
  scoredAudits: number;         // con Total Score numerico
  averageScore: number | null;  // null se nessuno score numerico
  ztpCount: number;
  fatalCount: number;
}

export interface ParameterRow {
  auditId: string;
  associateName: string;
  auditDate: string | null;
  parameter: string;
  score: number | null;
  reasons: string[];
}

export interface ParetoRow {
  reason: string;
  count: number;
  cumulativePercentage: number;
}

export type TrendGranularity = "day" | "week" | "month";

export interface TrendBucket {
  bucket: string;
  totalAudits: number;
  averageScore: number | null;
}

export interface TimelinePoint {
  auditId: string;
  auditDate: string;
  associateName: string;
  totalScore: number;
}

export interface FilterOptions {
  associates: string[];
  teamLeads: string[];
  auditTypes: string[];
  auditors: string[];
  dateSpan: DateRange | null;
}

// ============================================================
// HELPERS
// ============================================================

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Media degli score numerici, non arrotondata
 */
export function meanScore(audits: readonly NormalizedAudit[]): number | null {
  const scores = audits
    .map((a) => a.totalScore)
    .filter((s): s is number => s !== null);
  if (scores.length === 0) return null;
  return scores.reduce((a, b) => a + b, 0) / scores.length;
}

function distinctSorted(values: string[]): string[] {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b));
}

/**
 * Chiave ISO week (YYYY-Www), settimana da lunedì
 */
export function isoWeekKey(day: string): string {
  const [y, m, d] = day.split("-").map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  const weekday = (date.getUTCDay() + 6) % 7; // lunedì = 0
  const thursday = new Date(date.getTime() + (3 - weekday) * 86_400_000);
  const year = thursday.getUTCFullYear();
  const dayOfYear =
    (thursday.getTime() - Date.UTC(year, 0, 1)) / 86_400_000 + 1;
  const week = Math.ceil(dayOfYear / 7);
  return `${year}-W${String(week).padStart(2, "0")}`;
}

export function bucketKey(day: string, granularity: TrendGranularity): string {
  switch (granularity) {
    case "day":
      return day;
    case "week":
      return isoWeekKey(day);
    case "month":
      return day.slice(0, 7);
  }
}

export function dateSpan(audits: readonly NormalizedAudit[]): DateRange | null {
  const days = audits
    .map((a) => a.auditDate)
    .filter((d): d is string => d !== null)
    .sort();
  if (days.length === 0) return null;
  return { from: days[0], to: days[days.length - 1] };
}

// ============================================================
// FILTERING
// ============================================================

/**
 * Intervallo richiesto, con default sugli estremi dei dati disponibili.
 * Con un solo estremo fornito, quello preso dai dati non lo scavalca:
 * l'intervallo resta valido e al più vuoto.
 */
export function resolveDateRange(
  audits: readonly NormalizedAudit[],
  filters: ReportFilters
): DateRange {
  for (const [label, value] of [["from", filters.from], ["to", filters.to]] as const) {
    if (value !== undefined && !isValidDay(value)) {
      throw new ValidationError(`Data "${label}" non valida: ${value} (atteso YYYY-MM-DD)`);
    }
  }

  if (filters.from !== undefined && filters.to !== undefined) {
    if (filters.from > filters.to) {
      throw new ValidationError(`Intervallo non valido: ${filters.from} > ${filters.to}`);
    }
    return { from: filters.from, to: filters.to };
  }

  const span = dateSpan(audits);
  if (filters.from !== undefined) {
    const to = span && span.to > filters.from ? span.to : filters.from;
    return { from: filters.from, to };
  }
  if (filters.to !== undefined) {
    const from = span && span.from < filters.to ? span.from : filters.to;
    return { from, to: filters.to };
  }
  if (!span) {
    throw new ValidationError("Nessun intervallo di date determinabile");
  }
  return span;
}

/**
 * Filtri in AND; i record senza data valida sono esclusi
 */
export function filterAudits(
  audits: readonly NormalizedAudit[],
  filters: ReportFilters
): { range: DateRange; audits: NormalizedAudit[] } {
  const range = resolveDateRange(audits, filters);
  const email = filters.associateEmail ? normalizeKeyPart(filters.associateEmail) : "";

  const matching = audits.filter((a) => {
    if (a.auditDate === null) return false;
    if (a.auditDate < range.from || a.auditDate > range.to) return false;
    if (filters.associateName && a.associateName !== filters.associateName) return false;
    if (email && a.associateEmail !== email) return false;
    if (filters.teamLead && a.teamLead !== filters.teamLead) return false;
    if (filters.auditType && a.auditType !== filters.auditType) return false;
    if (filters.auditorName && a.auditorName !== filters.auditorName) return false;
    return true;
  });

  return { range, audits: matching };
}

// ============================================================
// AGGREGATIONS
// ============================================================

/**
 * Score non numerici: contati nel totale, esclusi dalla media
 */
export function summarize(audits: readonly NormalizedAudit[]): ScoreSummary {
  return {
    totalAudits: audits.length,
    scoredAudits: audits.filter((a) => a.totalScore !== null).length,
    averageScore: meanScore(audits),
    ztpCount: audits.filter((a) => a.ztpViolation).length,
    fatalCount: audits.filter((a) => a.fatalError).length,
  };
}

/**
 * Una riga per coppia (audit, parametro)
 */
export function parameterRows(audits: readonly NormalizedAudit[]): ParameterRow[] {
  return audits.flatMap((a) =>
    a.parameters.map((p) => ({
      auditId: a.auditId,
      associateName: a.associateName,
      auditDate: a.auditDate,
      parameter: p.parameter,
      score: p.score,
      reasons: [...p.reasons],
    }))
  );
}

/**
 * Tabella di Pareto dei motivi di non conformità.
 * Ordine: conteggio decrescente, a parità alfabetico.
 */
export function paretoTable(audits: readonly NormalizedAudit[]): ParetoRow[] {
  const counts = new Map<string, number>();

  for (const audit of audits) {
    for (const p of audit.parameters) {
      if (p.reasons.length === 1 && p.reasons[0] === COMPLIANT) continue;
      for (const reason of p.reasons) {
        if (reason === COMPLIANT) continue;
        counts.set(reason, (counts.get(reason) ?? 0) + 1);
      }
    }
  }

  const total = [...counts.values()].reduce((a, b) => a + b, 0);
  const sorted = [...counts.entries()].sort(
    ([ra, ca], [rb, cb]) => cb - ca || ra.localeCompare(rb)
  );

  let running = 0;
  return sorted.map(([reason, count]) => {
    running += count;
    return {
      reason,
      count,
      cumulativePercentage: (running / total) * 100,
    };
  });
}

/**
 * Trend per giorno / settimana ISO / mese, bucket in ordine crescente
 */
export function scoreTrend(
  audits: readonly NormalizedAudit[],
  granularity: TrendGranularity
): TrendBucket[] {
  const groups = new Map<string, NormalizedAudit[]>();
  for (const audit of audits) {
    if (audit.auditDate === null) continue;
    const key = bucketKey(audit.auditDate, granularity);
    const group = groups.get(key);
    if (group) group.push(audit);
    else groups.set(key, [audit]);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([bucket, group]) => ({
      bucket,
      totalAudits: group.length,
      averageScore: meanScore(group),
    }));
}

export function scoreTimeline(audits: readonly NormalizedAudit[]): TimelinePoint[] {
  const points: TimelinePoint[] = [];
  for (const a of audits) {
    if (a.auditDate === null || a.totalScore === null) continue;
    points.push({
      auditId: a.auditId,
      auditDate: a.auditDate,
      associateName: a.associateName,
      totalScore: a.totalScore,
    });
  }
  return points.sort((x, y) => x.auditDate.localeCompare(y.auditDate));
}

/**
 * Più recenti prima; senza data in coda
 */
export function newestFirst(audits: readonly NormalizedAudit[]): NormalizedAudit[] {
  return [...audits].sort((a, b) => {
    if (a.auditDate === b.auditDate) return 0;
    if (a.auditDate === null) return 1;
    if (b.auditDate === null) return -1;
    return b.auditDate.localeCompare(a.auditDate);
  });
}

export function filterOptions(audits: readonly NormalizedAudit[]): FilterOptions {
  const dated = audits.filter((a) => a.auditDate !== null);
  return {
    associates: distinctSorted(dated.map((a) => a.associateName)),
    teamLeads: distinctSorted(dated.map((a) => a.teamLead)),
    auditTypes: distinctSorted(dated.map((a) => a.auditType)),
    auditors: distinctSorted(dated.map((a) => a.auditorName)),
    dateSpan: dateSpan(dated),
  };
}

// ============================================================
// DASHBOARD
// ============================================================

export interface DashboardReport {
  range: DateRange;
  filters: ReportFilters;
  summary: ScoreSummary;
  parameterRows: ParameterRow[];
  pareto: ParetoRow[];
  trends: Record<TrendGranularity, TrendBucket[]>;
  timeline: TimelinePoint[];
  audits: NormalizedAudit[];
  options: FilterOptions;
}

export function buildDashboard(
  records: readonly StoredRecord[],
  filters: ReportFilters
): DashboardReport {
  const all = records.map(normalizeAuditRecord);
  const { range, audits } = filterAudits(all, filters);

  return {
    range,
    filters,
    summary: summarize(audits),
    parameterRows: parameterRows(audits),
    pareto: paretoTable(audits),
    trends: {
      day: scoreTrend(audits, "day"),
      week: scoreTrend(audits, "week"),
      month: scoreTrend(audits, "month"),
    },
    timeline: scoreTimeline(audits),
    audits: newestFirst(audits),
    options: filterOptions(all),
  };
}

// ============================================================
// ASSOCIATE STATS (sidebar del form)
// ============================================================

export interface AssociateStats {
  associateEmail: string;
  month: string;   // YYYY-MM
  thisMonth: {
    totalAudits: number;
    averageScore: number | null;
    byAuditType: Array<{ auditType: string; averageScore: number | null }>;
    dailyTrend: TrendBucket[];
  };
  lifetime: {
    totalAudits: number;
    averageScore: number | null;
  };
  recent: Array<{ auditDate: string | null; auditType: string; totalScore: number | null }>;
}

export const RECENT_AUDITS_LIMIT = 5;

export function associateStats(
  records: readonly StoredRecord[],
  associateEmail: string,
  today: string
): AssociateStats {
  if (!isValidDay(today)) {
    throw new ValidationError(`Data di riferimento non valida: ${today}`);
  }
  const email = normalizeKeyPart(associateEmail);
  if (!email) {
    throw new ValidationError("Email associate obbligatoria");
  }

  const mine = records
    .map(normalizeAuditRecord)
    .filter((a) => a.associateEmail === email);
  const month = today.slice(0, 7);
  const thisMonth = mine.filter((a) => a.auditDate?.startsWith(month) ?? false);

  const byType = new Map<string, NormalizedAudit[]>();
  for (const a of thisMonth) {
    byType.set(a.auditType, [...(byType.get(a.auditType) ?? []), a]);
  }

  return {
    associateEmail: email,
    month,
    thisMonth: {
      totalAudits: thisMonth.length,
      averageScore: meanScore(thisMonth),
      byAuditType: [...byType.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([auditType, group]) => ({ auditType, averageScore: meanScore(group) })),
      dailyTrend: scoreTrend(thisMonth, "day"),
    },
    lifetime: {
      totalAudits: mine.length,
      averageScore: meanScore(mine),
    },
    recent: newestFirst(mine)
      .slice(0, RECENT_AUDITS_LIMIT)
      .map((a) => ({
        auditDate: a.auditDate,
        auditType: a.auditType,
        totalScore: a.totalScore,
      })),
  };
}

// ============================================================
// PRESENTATION
// ============================================================
// Le aggregazioni restano a precisione piena; le route arrotondano
// medie e percentuali a 2 decimali solo in uscita.

function roundMean(value: number | null): number | null {
  return value === null ? null : round2(value);
}

export function presentBuckets(buckets: readonly TrendBucket[]): TrendBucket[] {
  return buckets.map((b) => ({ ...b, averageScore: roundMean(b.averageScore) }));
}

export function presentSummary(summary: ScoreSummary): ScoreSummary {
  return { ...summary, averageScore: roundMean(summary.averageScore) };
}

export function presentDashboard(report: DashboardReport): DashboardReport {
  return {
    ...report,
    summary: presentSummary(report.summary),
    pareto: report.pareto.map((row) => ({
      ...row,
      cumulativePercentage: round2(row.cumulativePercentage),
    })),
    trends: {
      day: presentBuckets(report.trends.day),
      week: presentBuckets(report.trends.week),
      month: presentBuckets(report.trends.month),
    },
  };
}

export function presentAssociateStats(stats: AssociateStats): AssociateStats {
  return {
    ...stats,
    thisMonth: {
      ...stats.thisMonth,
      averageScore: roundMean(stats.thisMonth.averageScore),
      byAuditType: stats.thisMonth.byAuditType.map((t) => ({
        ...t,
        averageScore: roundMean(t.averageScore),
      })),
      dailyTrend: presentBuckets(stats.thisMonth.dailyTrend),
    },
    lifetime: {
      ...stats.lifetime,
      averageScore: roundMean(stats.lifetime.averageScore),
    },
  };
}
