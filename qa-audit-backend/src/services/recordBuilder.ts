// qa-audit-backend/src/services/recordBuilder.ts
// Assemblaggio del documento audit finale (nessun I/O)

import { randomUUID } from "node:crypto";
import type { AuditDocument, AuditForm, YesNo } from "../types/auditRecord";
import type { ScoringResult } from "../types/scoring";
import type { AssociateInfo } from "./associateDirectory";

const pad = (n: number): string => String(n).padStart(2, "0");

/**
 * YYYY-MM-DD nell'ora locale del server
 */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatTimestamp(date: Date): string {
  return `${formatDay(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function randomSuffix(): string {
  return randomUUID().replace(/-/g, "").slice(0, 6);
}

/**
 * audit_YYYYMMDD_HHMMSS_xxxxxx: prefisso temporale + suffisso casuale.
 * Collisioni trascurabili, non garantite impossibili.
 */
export function generateAuditId(now: Date, suffix: string = randomSuffix()): string {
  const day = formatDay(now).replace(/-/g, "");
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `audit_${day}_${time}_${suffix}`;
}

export function recordObjectName(auditId: string): string {
  return `${auditId}.json`;
}

const yesNo = (flag: boolean): YesNo => (flag ? "Yes" : "No");

export interface BuildAuditRecordInput {
  associate: AssociateInfo;
  auditorName: string;
  form: AuditForm;
  scoring: ScoringResult;
  now?: Date;
  idSuffix?: string;
}

export function buildAuditRecord(input: BuildAuditRecordInput): Readonly<AuditDocument> {
  const { associate, auditorName, form, scoring } = input;
  const now = input.now ?? new Date();

  const record: AuditDocument = {
    "Audit ID": generateAuditId(now, input.idSuffix),
    Queue: form.queue,
    "Call Date": form.callDate ?? "",
    "Calling Number": form.callingNumber,
    "Entity ID": form.entityId,
    "Audit Date": formatDay(now),
    "Associate Email ID": associate.email,
    "Associate Name": associate.name,
    "Team Lead": associate.teamLead,
    "Team Leader Email": associate.teamLeadEmail,
    LOB: associate.lob,
    Department: associate.department,
    "Auditor Name": auditorName,
    "Audit Type": form.auditType,
    "Call Duration": form.callDuration,
    "Hold Duration": form.holdDuration,
    "Call Link": form.callLink,
    "ZTP Violation": yesNo(scoring.ztpViolation),
    "Fatal Error": yesNo(scoring.fatalError),
    "Score Tag": scoring.tag,
    "Computed Score": scoring.totalScore,
    "Total Score": scoring.displayedScore,
    Observations: form.observations,
    "Issue VOC": form.issueDescription,
    Resolution: form.resolution,
    Parameters: scoring.parameterResults.map((r) =>
      Object.freeze({
        Parameter: r.parameter,
        "Selected Reasons": r.selectedReasons.join(", "),
        "Selected Reasons Scored": [...r.selectedReasons],
        Score: r.score,
      })
    ),
    "Email Sent": yesNo(form.emailSent),
    "Email Timestamp": form.emailSent ? formatTimestamp(now) : null,
    "Submitted At": now.toISOString(),
  };

  Object.freeze(record.Parameters);
  return Object.freeze(record);
}

export function serializeAuditRecord(record: Readonly<AuditDocument>): string {
  return JSON.stringify(record, null, 2);
}
