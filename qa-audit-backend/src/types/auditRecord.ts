// qa-audit-backend/src/types/auditRecord.ts
// Documento audit persistito + form di invio
// CONTRATTO STORAGE: i nomi dei campi sono quelli letti dalla dashboard storica

import { z } from "zod";
import type { ScoreTag } from "./scoring";

export type YesNo = "Yes" | "No";

export interface StoredParameterResult {
  Parameter: string;
  "Selected Reasons": string;            // formato storico, motivi separati da ", "
  "Selected Reasons Scored": string[];   // motivi effettivamente usati per lo score
  Score: number;
}

export interface AuditDocument {
  "Audit ID": string;
  Queue: string;
  "Call Date": string;
  "Calling Number": string;
  "Entity ID": string;
  "Audit Date": string;                  // YYYY-MM-DD
  "Associate Email ID": string;
  "Associate Name": string;
  "Team Lead": string;
  "Team Leader Email": string;
  LOB: string;
  Department: string;
  "Auditor Name": string;
  "Audit Type": string;
  "Call Duration": string;
  "Hold Duration": string;
  "Call Link": string;
  "ZTP Violation": YesNo;
  "Fatal Error": YesNo;
  "Score Tag": ScoreTag | null;
  "Computed Score": number;              // somma parametri prima di ZTP/Fatal
  "Total Score": number;                 // score mostrato
  Observations: string;
  "Issue VOC": string;
  Resolution: string;
  Parameters: StoredParameterResult[];
  "Email Sent": YesNo;
  "Email Timestamp": string | null;
  "Submitted At": string;                // ISO8601
}

// ============================================================
// FORM DI INVIO
// ============================================================

const optionalText = z.string().trim().max(5000).default("");

export const AuditFormSchema = z.object({
  queue: z.string().trim().min(1, "Queue obbligatoria"),
  auditType: z.string().trim().min(1, "Audit Type obbligatorio"),
  entityId: z.string().trim().min(1, "Entity ID obbligatorio"),
  callDate: z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Call Date nel formato YYYY-MM-DD")
    .optional(),
  callingNumber: optionalText,
  callDuration: optionalText,
  holdDuration: optionalText,
  callLink: optionalText,
  ztpViolation: z.boolean().default(false),
  selections: z.record(z.string(), z.array(z.string())).default({}),
  observations: optionalText,
  issueDescription: optionalText,
  resolution: optionalText,
  emailSent: z.boolean().default(false),
});

export type AuditForm = z.output<typeof AuditFormSchema>;
export type AuditFormInput = z.input<typeof AuditFormSchema>;
