// qa-audit-backend/src/services/associateDirectory.ts
// Anagrafica associate (sola lettura) da employee CSV

import { z } from "zod";
import { parseCsvTable, readCsvTable, textCell } from "./csvTable";

const TABLE_NAME = "employee directory";

export const EmployeeRowSchema = z.object({
  "Work Email": z.string().trim().min(1, "email obbligatoria"),
  "Full Name": textCell,
  "Reporting To": textCell,
  Department: textCell,
  LOB: textCell,
});

export type EmployeeRow = z.output<typeof EmployeeRowSchema>;

export interface AssociateInfo {
  email: string;
  name: string;
  teamLead: string;
  teamLeadEmail: string;
  department: string;
  lob: string;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class AssociateDirectory {
  private readonly byEmail = new Map<string, EmployeeRow>();
  private readonly emailByName = new Map<string, string>();

  constructor(rows: EmployeeRow[]) {
    for (const row of rows) {
      const email = normalizeEmail(row["Work Email"]);
      // in caso di email ripetute vale la prima riga
      if (!this.byEmail.has(email)) this.byEmail.set(email, row);
      if (row["Full Name"] && !this.emailByName.has(row["Full Name"])) {
        this.emailByName.set(row["Full Name"], email);
      }
    }
  }

  static fromCsv(text: string): AssociateDirectory {
    return new AssociateDirectory(parseCsvTable(text, EmployeeRowSchema, TABLE_NAME));
  }

  static async load(filePath: string): Promise<AssociateDirectory> {
    return new AssociateDirectory(
      await readCsvTable(filePath, EmployeeRowSchema, TABLE_NAME)
    );
  }

  get size(): number {
    return this.byEmail.size;
  }

  /**
   * Email del team lead risolta cercando il suo nome nella stessa anagrafica
   */
  lookup(email: string): AssociateInfo | null {
    const key = normalizeEmail(email);
    const row = this.byEmail.get(key);
    if (!row) return null;

    const teamLead = row["Reporting To"];
    return {
      email: key,
      name: row["Full Name"],
      teamLead,
      teamLeadEmail: teamLead ? this.emailByName.get(teamLead) ?? "" : "",
      department: row.Department,
      lob: row.LOB,
    };
  }
}
