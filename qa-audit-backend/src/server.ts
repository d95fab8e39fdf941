import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import { loadConfig } from "./config";
import { AssociateDirectory } from "./services/associateDirectory";
import { AuditWorkflow } from "./services/auditSession";
import { loadRuleTable } from "./services/ruleTable";
import { createRecordSource } from "./storage/createRecordSource";
import { errorMessage, ValidationError } from "./errors";

async function main(): Promise<void> {
  const config = loadConfig();
  const [rules, directory] = await Promise.all([
    loadRuleTable(config.rulesCsv),
    AssociateDirectory.load(config.employeesCsv),
  ]);
  const source = createRecordSource(config);
  const workflow = new AuditWorkflow({ rules, directory, source });
  const app = createApp({ config, workflow, source });

  app.listen(config.port, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   📋 Quality Audit Backend avviato                        ║
║                                                           ║
║   Porta: ${String(config.port).padEnd(49)}║
║   Ambiente: ${config.env.padEnd(46)}║
║   Record store: ${config.recordStore.padEnd(42)}║
║   Parametri: ${String(rules.parameters.length).padEnd(9)}Associate: ${String(directory.size).padEnd(25)}║
║                                                           ║
║   Endpoints disponibili:                                  ║
║   • GET  /health                                          ║
║   • GET  /api/rules                                       ║
║   • POST /api/score                                       ║
║   • POST /api/sessions                                    ║
║   • POST /api/sessions/:id/associate                      ║
║   • POST /api/sessions/:id/duplicate-check                ║
║   • POST /api/sessions/:id/submit                         ║
║   • POST /api/sessions/:id/reset                          ║
║   • GET  /api/reports/dashboard                           ║
║   • GET  /api/reports/trend                               ║
║   • GET  /api/reports/associates/:email/stats             ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
  });
}

main().catch((err: unknown) => {
  console.error(`[${new Date().toISOString()}] Avvio fallito:`, errorMessage(err));
  if (err instanceof ValidationError) {
    for (const issue of err.issues) console.error(`  - ${issue}`);
  }
  process.exit(1);
});
