// qa-audit-backend/src/routes/reports.ts
// Dashboard qualità: aggregazioni sui record salvati

import { Router, Request, Response } from "express";
import { z } from "zod";
import { loadStoredRecords, normalizeAuditRecord } from "../services/auditRecords";
import { formatDay } from "../services/recordBuilder";
import {
  associateStats,
  buildDashboard,
  filterAudits,
  presentAssociateStats,
  presentBuckets,
  presentDashboard,
  scoreTrend,
} from "../services/reporting";
import type { RecordSource } from "../storage/recordSource";
import { parseInput, sendError, sendOk } from "./http";

// "All" come nella select della dashboard = nessun filtro
const filterValue = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v !== "All" ? v : undefined));

const ReportQuerySchema = z.object({
  from: filterValue,
  to: filterValue,
  associate: filterValue,
  associateEmail: filterValue,
  teamLead: filterValue,
  auditType: filterValue,
  auditor: filterValue,
});

const TrendQuerySchema = ReportQuerySchema.extend({
  granularity: z.enum(["day", "week", "month"]).default("week"),
});

const StatsQuerySchema = z.object({
  today: z.string().trim().optional(),
});

function toFilters(query: z.output<typeof ReportQuerySchema>) {
  return {
    from: query.from,
    to: query.to,
    associateName: query.associate,
    associateEmail: query.associateEmail,
    teamLead: query.teamLead,
    auditType: query.auditType,
    auditorName: query.auditor,
  };
}

export function createReportsRouter(source: RecordSource): Router {
  const router = Router();

  router.get("/reports/dashboard", async (req: Request, res: Response) => {
    const route = "GET /api/reports/dashboard";
    const startTime = Date.now();
    try {
      const filters = toFilters(parseInput(ReportQuerySchema, req.query, "Filtri"));
      const { records, skipped } = await loadStoredRecords(source);
      const report = buildDashboard(records, filters);
      console.log(
        `[${new Date().toISOString()}] ${route} - record=${records.length} saltati=${skipped.length} filtrati=${report.summary.totalAudits}`
      );
      return sendOk(res, route, startTime, {
        ...presentDashboard(report),
        skippedRecords: skipped.map((s) => s.recordName),
      });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/reports/trend", async (req: Request, res: Response) => {
    const route = "GET /api/reports/trend";
    const startTime = Date.now();
    try {
      const query = parseInput(TrendQuerySchema, req.query, "Filtri");
      const { records } = await loadStoredRecords(source);
      const { range, audits } = filterAudits(
        records.map(normalizeAuditRecord),
        toFilters(query)
      );
      return sendOk(res, route, startTime, {
        range,
        granularity: query.granularity,
        buckets: presentBuckets(scoreTrend(audits, query.granularity)),
      });
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/reports/associates/:email/stats", async (req: Request, res: Response) => {
    const route = "GET /api/reports/associates/:email/stats";
    const startTime = Date.now();
    try {
      const { today } = parseInput(StatsQuerySchema, req.query, "Parametri");
      const { records } = await loadStoredRecords(source);
      return sendOk(
        res,
        route,
        startTime,
        presentAssociateStats(
          associateStats(records, req.params.email, today ?? formatDay(new Date()))
        )
      );
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  return router;
}
