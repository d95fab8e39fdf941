// qa-audit-backend/src/routes/audits.ts
// Form audit: rule table, anteprima score, sessioni e invio

import { Router, Request, Response } from "express";
import { z } from "zod";
import { selectableReasons } from "../services/ruleTable";
import { AuditSession, AuditWorkflow, SessionStore } from "../services/auditSession";
import { parseInput, sendError, sendOk } from "./http";

const ScoreRequestSchema = z.object({
  selections: z.record(z.string(), z.array(z.string())).default({}),
  ztpViolation: z.boolean().default(false),
});

const StartSessionSchema = z.object({
  auditorName: z.string().trim().min(1, "auditorName obbligatorio"),
});

const AssociateLookupSchema = z.object({
  email: z.string().trim().min(1, "email obbligatoria"),
});

const DuplicateCheckSchema = z.object({
  entityId: z.string().trim().min(1, "entityId obbligatorio"),
});

function sessionView(session: AuditSession) {
  return {
    sessionId: session.id,
    auditorName: session.auditorName,
    associate: session.associate,
    duplicateCheck: session.duplicateCheck,
    submittedAuditId: session.submittedAuditId,
  };
}

export function createAuditRouter(workflow: AuditWorkflow, sessions: SessionStore): Router {
  const router = Router();

  router.get("/rules", (_req: Request, res: Response) => {
    const startTime = Date.now();
    return sendOk(res, "GET /api/rules", startTime, {
      parameters: workflow.rules.parameters.map((p) => ({
        ...p,
        reasons: selectableReasons(p),
      })),
    });
  });

  router.post("/score", (req: Request, res: Response) => {
    const route = "POST /api/score";
    const startTime = Date.now();
    try {
      const { selections, ztpViolation } = parseInput(
        ScoreRequestSchema,
        req.body,
        "Richiesta di scoring"
      );
      return sendOk(res, route, startTime, workflow.preview(selections, ztpViolation));
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/sessions", (req: Request, res: Response) => {
    const route = "POST /api/sessions";
    const startTime = Date.now();
    try {
      const { auditorName } = parseInput(StartSessionSchema, req.body, "Sessione");
      const session = sessions.create(auditorName);
      console.log(
        `[${new Date().toISOString()}] ${route} - Sessione ${session.id} per ${session.auditorName}`
      );
      return sendOk(res, route, startTime, sessionView(session), 201);
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.get("/sessions/:id", (req: Request, res: Response) => {
    const route = "GET /api/sessions/:id";
    const startTime = Date.now();
    try {
      return sendOk(res, route, startTime, sessionView(sessions.get(req.params.id)));
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/sessions/:id/associate", (req: Request, res: Response) => {
    const route = "POST /api/sessions/:id/associate";
    const startTime = Date.now();
    try {
      const session = sessions.get(req.params.id);
      const { email } = parseInput(AssociateLookupSchema, req.body, "Lookup associate");
      return sendOk(res, route, startTime, workflow.lookupAssociate(session, email));
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/sessions/:id/duplicate-check", async (req: Request, res: Response) => {
    const route = "POST /api/sessions/:id/duplicate-check";
    const startTime = Date.now();
    try {
      const session = sessions.get(req.params.id);
      const { entityId } = parseInput(DuplicateCheckSchema, req.body, "Controllo duplicati");
      const state = await workflow.checkDuplicate(session, entityId);
      return sendOk(res, route, startTime, state);
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/sessions/:id/submit", async (req: Request, res: Response) => {
    const route = "POST /api/sessions/:id/submit";
    const startTime = Date.now();
    try {
      const session = sessions.get(req.params.id);
      const record = await workflow.submit(session, req.body);
      console.log(
        `[${new Date().toISOString()}] ${route} - Audit ${record["Audit ID"]} salvato (score ${record["Total Score"]})`
      );
      return sendOk(res, route, startTime, record, 201);
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.post("/sessions/:id/reset", (req: Request, res: Response) => {
    const route = "POST /api/sessions/:id/reset";
    const startTime = Date.now();
    try {
      const session = sessions.get(req.params.id);
      workflow.reset(session);
      return sendOk(res, route, startTime, sessionView(session));
    } catch (error) {
      return sendError(res, route, startTime, error);
    }
  });

  router.delete("/sessions/:id", (req: Request, res: Response) => {
    const route = "DELETE /api/sessions/:id";
    const startTime = Date.now();
    return sendOk(res, route, startTime, { ended: sessions.end(req.params.id) });
  });

  return router;
}
