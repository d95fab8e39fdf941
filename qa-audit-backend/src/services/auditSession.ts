// qa-audit-backend/src/services/auditSession.ts
// Contesto esplicito per sessione auditor + flusso di invio audit

import { randomUUID } from "node:crypto";
import {
  DuplicateError,
  NotFoundError,
  ValidationError,
} from "../errors";
import type { RecordSource } from "../storage/recordSource";
import {
  AuditDocument,
  AuditFormSchema,
} from "../types/auditRecord";
import type { ReasonSelections, RuleTable, ScoringResult } from "../types/scoring";
import { AssociateDirectory, AssociateInfo } from "./associateDirectory";
import { isDuplicate, normalizeKeyPart } from "./duplicateChecker";
import {
  buildAuditRecord,
  recordObjectName,
  serializeAuditRecord,
} from "./recordBuilder";
import { scoreAudit } from "./scoring";
import { SerialQueue } from "./serialQueue";

export interface DuplicateCheckState {
  entityId: string;
  associateEmail: string;
  unique: boolean;
  checkedAt: string;
}

/**
 * Stato di una sessione: creato all'avvio, ripulito da "submit another"
 */
export interface AuditSession {
  id: string;
  auditorName: string;
  startedAt: number;
  lastSeenAt: number;
  associate: AssociateInfo | null;
  duplicateCheck: DuplicateCheckState | null;
  submittedAuditId: string | null;
}

// ============================================================
// SESSION STORE
// ============================================================

export class SessionStore {
  private readonly sessions = new Map<string, AuditSession>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  create(auditorName: string): AuditSession {
    const name = auditorName.trim();
    if (!name) {
      throw new ValidationError("Nome auditor obbligatorio");
    }
    this.prune();
    const t = this.now();
    const session: AuditSession = {
      id: randomUUID(),
      auditorName: name,
      startedAt: t,
      lastSeenAt: t,
      associate: null,
      duplicateCheck: null,
      submittedAuditId: null,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): AuditSession {
    const session = this.sessions.get(id);
    if (!session || this.isExpired(session)) {
      this.sessions.delete(id);
      throw new NotFoundError(`Sessione non trovata o scaduta: ${id}`);
    }
    session.lastSeenAt = this.now();
    return session;
  }

  end(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: AuditSession): boolean {
    return this.now() - session.lastSeenAt > this.ttlMs;
  }

  prune(): void {
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) this.sessions.delete(id);
    }
  }
}

// ============================================================
// WORKFLOW
// ============================================================

export interface AuditWorkflowDeps {
  rules: RuleTable;
  directory: AssociateDirectory;
  source: RecordSource;
  queue?: SerialQueue;
  clock?: () => Date;
}

export class AuditWorkflow {
  private readonly queue: SerialQueue;
  private readonly clock: () => Date;

  constructor(private readonly deps: AuditWorkflowDeps) {
    this.queue = deps.queue ?? new SerialQueue();
    this.clock = deps.clock ?? (() => new Date());
  }

  get rules(): RuleTable {
    return this.deps.rules;
  }

  /**
   * Cambiare associate invalida il controllo duplicati precedente
   */
  lookupAssociate(session: AuditSession, email: string): AssociateInfo {
    if (!email.trim()) {
      throw new ValidationError("Email associate obbligatoria");
    }
    const info = this.deps.directory.lookup(email);
    if (!info) {
      throw new NotFoundError(`Associate non trovato: ${email.trim()}`);
    }
    session.associate = info;
    session.duplicateCheck = null;
    return info;
  }

  async checkDuplicate(
    session: AuditSession,
    entityId: string
  ): Promise<DuplicateCheckState> {
    const associate = this.requireAssociate(session);
    if (!entityId.trim()) {
      throw new ValidationError("Inserisci un Entity ID prima del controllo");
    }

    const duplicate = await isDuplicate(entityId, associate.email, this.deps.source);
    const state: DuplicateCheckState = {
      entityId: entityId.trim(),
      associateEmail: associate.email,
      unique: !duplicate,
      checkedAt: this.clock().toISOString(),
    };
    session.duplicateCheck = state;
    return state;
  }

  preview(selections: ReasonSelections, ztpViolation: boolean): ScoringResult {
    return scoreAudit(this.deps.rules, selections, ztpViolation);
  }

  /**
   * Invio: tutto o niente. Richiede un controllo duplicati positivo sulla
   * stessa chiave; il controllo viene ripetuto insieme all'append.
   */
  async submit(session: AuditSession, input: unknown): Promise<Readonly<AuditDocument>> {
    if (session.submittedAuditId) {
      throw new ValidationError(
        `Audit ${session.submittedAuditId} già inviato: avvia un nuovo audit`
      );
    }

    const parsed = AuditFormSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        "Form audit non valido",
        parsed.error.issues.map((i) => `${i.path.join(".") || "form"}: ${i.message}`)
      );
    }
    const form = parsed.data;
    const associate = this.requireAssociate(session);

    const check = session.duplicateCheck;
    if (
      !check ||
      normalizeKeyPart(check.entityId) !== normalizeKeyPart(form.entityId) ||
      check.associateEmail !== associate.email
    ) {
      throw new ValidationError(
        `Controlla prima se l'Entity ID "${form.entityId}" è già stato auditato`
      );
    }
    if (!check.unique) {
      throw new DuplicateError(form.entityId, associate.email);
    }

    const scoring = scoreAudit(this.deps.rules, form.selections, form.ztpViolation);

    const record = await this.queue.run(async () => {
      // due submit concorrenti della stessa sessione: il secondo trova l'ID già impostato
      if (session.submittedAuditId) {
        throw new ValidationError(
          `Audit ${session.submittedAuditId} già inviato: avvia un nuovo audit`
        );
      }
      if (await isDuplicate(form.entityId, associate.email, this.deps.source)) {
        check.unique = false;
        throw new DuplicateError(form.entityId, associate.email);
      }
      const built = buildAuditRecord({
        associate,
        auditorName: session.auditorName,
        form,
        scoring,
        now: this.clock(),
      });
      await this.deps.source.append(
        recordObjectName(built["Audit ID"]),
        serializeAuditRecord(built)
      );
      session.submittedAuditId = built["Audit ID"];
      return built;
    });

    return record;
  }

  /**
   * "Submit another": azzera associate, controllo duplicati e invio
   */
  reset(session: AuditSession): void {
    session.associate = null;
    session.duplicateCheck = null;
    session.submittedAuditId = null;
  }

  private requireAssociate(session: AuditSession): AssociateInfo {
    if (!session.associate) {
      throw new ValidationError("Cerca prima i dettagli dell'associate");
    }
    return session.associate;
  }
}
