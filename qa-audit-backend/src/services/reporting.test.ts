import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors";
import { normalizeAuditRecord, StoredRecord } from "./auditRecords";
import {
  associateStats,
  buildDashboard,
  filterAudits,
  isoWeekKey,
  paretoTable,
  parameterRows,
  presentAssociateStats,
  presentDashboard,
  scoreTrend,
  summarize,
} from "./reporting";

let seq = 0;
function rec(data: Record<string, unknown>): StoredRecord {
  seq += 1;
  return { name: `audit_${seq}.json`, data };
}

const normalize = (records: StoredRecord[]) => records.map(normalizeAuditRecord);

describe("isoWeekKey", () => {
  it("uses ISO weeks starting on Monday", () => {
    expect(isoWeekKey("2024-04-01")).toBe("2024-W14");
    expect(isoWeekKey("2024-04-07")).toBe("2024-W14");
    expect(isoWeekKey("2024-04-08")).toBe("2024-W15");
  });

  it("assigns year-boundary days to the ISO year", () => {
    expect(isoWeekKey("2021-01-01")).toBe("2020-W53");
    expect(isoWeekKey("2024-12-30")).toBe("2025-W01");
  });
});

describe("scoreTrend", () => {
  const audits = normalize([
    rec({ "Audit Date": "2024-04-01", "Total Score": 80 }),
    rec({ "Audit Date": "2024-04-03", "Total Score": 90 }),
    rec({ "Audit Date": "2024-04-10", "Total Score": 70 }),
  ]);

  it("groups by ISO week", () => {
    expect(scoreTrend(audits, "week")).toEqual([
      { bucket: "2024-W14", totalAudits: 2, averageScore: 85 },
      { bucket: "2024-W15", totalAudits: 1, averageScore: 70 },
    ]);
  });

  it("groups by day and by month", () => {
    expect(scoreTrend(audits, "day").map((b) => b.bucket)).toEqual([
      "2024-04-01",
      "2024-04-03",
      "2024-04-10",
    ]);
    expect(scoreTrend(audits, "month")).toEqual([
      { bucket: "2024-04", totalAudits: 3, averageScore: 80 },
    ]);
  });
});

describe("summarize", () => {
  it("counts non-numeric scores but leaves them out of the mean", () => {
    const summary = summarize(
      normalize([
        rec({ "Audit Date": "2024-04-01", "Total Score": 80 }),
        rec({ "Audit Date": "2024-04-02", "Total Score": "90" }),
        rec({ "Audit Date": "2024-04-02", "Total Score": "N/A", "ZTP Violation": "Yes" }),
      ])
    );
    expect(summary).toEqual({
      totalAudits: 3,
      scoredAudits: 2,
      averageScore: 85,
      ztpCount: 1,
      fatalCount: 0,
    });
  });

  it("has no mean without numeric scores", () => {
    expect(summarize([]).averageScore).toBeNull();
  });
});

describe("filterAudits", () => {
  const audits = normalize([
    rec({
      "Audit Date": "2024-04-01",
      "Associate Name": "Priya Sharma",
      "Audit Type": "Regular Audit",
      "Team Lead": "Rahul Verma",
      "Auditor Name": "qa.lead",
    }),
    rec({
      "Audit Date": "2024-04-03",
      "Associate Name": "Priya Sharma",
      "Audit Type": "OJT-Feedback1",
      "Team Lead": "Rahul Verma",
      "Auditor Name": "qa.lead",
    }),
    rec({
      "Audit Date": "2024-04-10",
      "Associate Name": "Arjun Mehta",
      "Audit Type": "Regular Audit",
      "Team Lead": "Rahul Verma",
      "Auditor Name": "qa.second",
    }),
    rec({ "Associate Name": "Priya Sharma", "Audit Type": "Regular Audit" }),
  ]);

  it("defaults the range to the dated records and drops undated ones", () => {
    const { range, audits: matching } = filterAudits(audits, {});
    expect(range).toEqual({ from: "2024-04-01", to: "2024-04-10" });
    expect(matching).toHaveLength(3);
  });

  it("combines all filters with AND", () => {
    const { audits: matching } = filterAudits(audits, {
      associateName: "Priya Sharma",
      auditType: "Regular Audit",
    });
    expect(matching.map((a) => a.auditDate)).toEqual(["2024-04-01"]);

    expect(
      filterAudits(audits, { teamLead: "Rahul Verma", auditorName: "qa.second" }).audits
    ).toHaveLength(1);
  });

  it("applies an inclusive date range", () => {
    const { audits: matching } = filterAudits(audits, { from: "2024-04-02", to: "2024-04-10" });
    expect(matching.map((a) => a.auditDate)).toEqual(["2024-04-03", "2024-04-10"]);
  });

  it("rejects invalid ranges", () => {
    expect(() => filterAudits(audits, { from: "2024-04-10", to: "2024-04-01" })).toThrow(
      "Intervallo non valido: 2024-04-10 > 2024-04-01"
    );
    expect(() => filterAudits(audits, { from: "04/01/2024" })).toThrow(ValidationError);
  });

  it("keeps a one-sided range valid when it lies outside the data", () => {
    const later = filterAudits(audits, { from: "2024-05-01" });
    expect(later.range).toEqual({ from: "2024-05-01", to: "2024-05-01" });
    expect(later.audits).toEqual([]);

    const earlier = filterAudits(audits, { to: "2024-03-01" });
    expect(earlier.range).toEqual({ from: "2024-03-01", to: "2024-03-01" });
    expect(earlier.audits).toEqual([]);
  });

  it("extends a one-sided range to the data", () => {
    expect(filterAudits(audits, { from: "2024-04-02" }).range).toEqual({
      from: "2024-04-02",
      to: "2024-04-10",
    });
    expect(filterAudits(audits, { to: "2024-04-05" }).range).toEqual({
      from: "2024-04-01",
      to: "2024-04-05",
    });
  });

  it("uses a single bound even without dated records", () => {
    expect(filterAudits([], { from: "2024-04-01" }).range).toEqual({
      from: "2024-04-01",
      to: "2024-04-01",
    });
  });

  it("fails when no date range can be resolved", () => {
    expect(() => filterAudits(normalize([rec({ "Total Score": 80 })]), {})).toThrow(
      "Nessun intervallo di date determinabile"
    );
  });
});

describe("parameter breakdown", () => {
  const audits = normalize([
    rec({
      "Audit Date": "2024-04-01",
      Parameters: [
        {
          Parameter: "Opening and Closing",
          "Selected Reasons Scored": ["Script & Guidelines adherence", "Survey pitch"],
          Score: 3,
        },
        { Parameter: "Properties", "Selected Reasons Scored": ["Compliant"], Score: 15 },
      ],
    }),
    rec({
      "Audit Date": "2024-04-02",
      Parameters: [
        {
          Parameter: "Opening and Closing",
          "Selected Reasons": "Script & Guidelines adherence",
          Score: 6,
        },
        {
          Parameter: "Communication and Language",
          "Selected Reasons Scored": ["Compliant", "Grammar and sentence construction"],
          Score: 18,
        },
      ],
    }),
    rec({
      "Audit Date": "2024-04-03",
      Parameters: [{ Parameter: "Opening and Closing", "Selected Reasons": "Compliant", Score: 9 }],
    }),
    rec({ "Audit Date": "2024-04-04", Parameters: "oops" }),
  ]);

  it("flattens one row per audit and parameter", () => {
    const rows = parameterRows(audits);
    expect(rows).toHaveLength(5);
    expect(rows[2]).toEqual({
      auditId: audits[1].auditId,
      associateName: "Unknown",
      auditDate: "2024-04-02",
      parameter: "Opening and Closing",
      score: 6,
      reasons: ["Script & Guidelines adherence"],
    });
  });

  it("ranks non-compliant reasons with a cumulative percentage", () => {
    expect(paretoTable(audits)).toEqual([
      { reason: "Script & Guidelines adherence", count: 2, cumulativePercentage: 50 },
      { reason: "Grammar and sentence construction", count: 1, cumulativePercentage: 75 },
      { reason: "Survey pitch", count: 1, cumulativePercentage: 100 },
    ]);
  });

  it("returns an empty Pareto table when everything is compliant", () => {
    expect(paretoTable(audits.slice(2))).toEqual([]);
  });
});

describe("buildDashboard", () => {
  const records = [
    rec({ "Audit Date": "2024-04-01", "Total Score": 80, "Associate Name": "Priya Sharma" }),
    rec({ "Audit Date": "2024-04-03", "Total Score": "N/A", "Associate Name": "Arjun Mehta" }),
    rec({ "Audit Date": "2024-04-10", "Total Score": 70, "Associate Name": "Priya Sharma" }),
  ];

  it("returns an empty summary for a start date after the data", () => {
    const report = buildDashboard(records, { from: "2024-05-01" });
    expect(report.summary.totalAudits).toBe(0);
    expect(report.summary.averageScore).toBeNull();
    expect(buildDashboard(records, { to: "2024-03-01" }).summary.totalAudits).toBe(0);
  });

  it("produces identical numbers on repeated runs", () => {
    expect(buildDashboard(records, {})).toEqual(buildDashboard(records, {}));
  });

  it("lists audits newest first and plots only numeric scores", () => {
    const report = buildDashboard(records, {});
    expect(report.audits.map((a) => a.auditDate)).toEqual([
      "2024-04-10",
      "2024-04-03",
      "2024-04-01",
    ]);
    expect(report.timeline.map((p) => [p.auditDate, p.totalScore])).toEqual([
      ["2024-04-01", 80],
      ["2024-04-10", 70],
    ]);
    expect(report.options.associates).toEqual(["Arjun Mehta", "Priya Sharma"]);
    expect(report.summary.totalAudits).toBe(3);
    expect(report.summary.averageScore).toBe(75);
  });
});

describe("associateStats", () => {
  const records = [
    rec({
      "Audit Date": "2024-04-02",
      "Associate Email ID": "x@y.com",
      "Audit Type": "Regular Audit",
      "Total Score": 80,
    }),
    rec({
      "Audit Date": "2024-04-09",
      "Associate Email ID": "X@Y.com",
      "Audit Type": "OJT-Feedback1",
      "Total Score": 60,
    }),
    rec({
      "Audit Date": "2024-03-20",
      "Associate Email ID": "x@y.com",
      "Audit Type": "Regular Audit",
      "Total Score": 100,
    }),
    rec({
      "Audit Date": "2024-04-05",
      "Associate Email ID": "other@y.com",
      "Audit Type": "Regular Audit",
      "Total Score": 10,
    }),
  ];

  it("splits this month from lifetime numbers", () => {
    const stats = associateStats(records, " x@y.com ", "2024-04-15");
    expect(stats.associateEmail).toBe("x@y.com");
    expect(stats.month).toBe("2024-04");
    expect(stats.thisMonth.totalAudits).toBe(2);
    expect(stats.thisMonth.averageScore).toBe(70);
    expect(stats.thisMonth.byAuditType).toEqual([
      { auditType: "OJT-Feedback1", averageScore: 60 },
      { auditType: "Regular Audit", averageScore: 80 },
    ]);
    expect(stats.thisMonth.dailyTrend).toHaveLength(2);
    expect(stats.lifetime).toEqual({ totalAudits: 3, averageScore: 80 });
    expect(stats.recent[0]).toEqual({
      auditDate: "2024-04-09",
      auditType: "OJT-Feedback1",
      totalScore: 60,
    });
  });

  it("validates the reference day", () => {
    expect(() => associateStats(records, "x@y.com", "15/04/2024")).toThrow(ValidationError);
  });
});

describe("presentation rounding", () => {
  const records = [
    rec({ "Audit Date": "2024-04-01", "Total Score": 80, "Associate Email ID": "x@y.com" }),
    rec({ "Audit Date": "2024-04-02", "Total Score": 85, "Associate Email ID": "x@y.com" }),
    rec({ "Audit Date": "2024-04-03", "Total Score": 86, "Associate Email ID": "x@y.com" }),
  ];

  it("keeps full precision in the aggregates", () => {
    expect(buildDashboard(records, {}).summary.averageScore).toBe(251 / 3);
  });

  it("rounds means to two decimals on output", () => {
    const report = presentDashboard(buildDashboard(records, {}));
    expect(report.summary.averageScore).toBe(83.67);
    expect(report.trends.month).toEqual([
      { bucket: "2024-04", totalAudits: 3, averageScore: 83.67 },
    ]);

    const stats = presentAssociateStats(associateStats(records, "x@y.com", "2024-04-15"));
    expect(stats.thisMonth.averageScore).toBe(83.67);
    expect(stats.lifetime.averageScore).toBe(83.67);
  });

  it("rounds the cumulative Pareto percentage on output", () => {
    const withReasons = [
      rec({
        "Audit Date": "2024-04-01",
        Parameters: [
          { Parameter: "Properties", "Selected Reasons Scored": ["Notes", "FD Properties", "Tags"] },
        ],
      }),
    ];
    expect(buildDashboard(withReasons, {}).pareto[0].cumulativePercentage).toBeCloseTo(33.3333, 4);
    expect(
      presentDashboard(buildDashboard(withReasons, {})).pareto.map((r) => r.cumulativePercentage)
    ).toEqual([33.33, 66.67, 100]);
  });
});
