import path from "node:path";
import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors";
import { loadRuleTable, parseRuleTable, selectableReasons } from "./ruleTable";

const HEADER = "Parameter,Max Score,Sub Reason,Deduction,Fatal,Fatal Parameter";

describe("parseRuleTable", () => {
  it("groups rows per parameter in order of appearance", () => {
    const table = parseRuleTable(
      [
        HEADER,
        "Opening and Closing,9,Script & Guidelines adherence,3,No,No",
        "Opening and Closing,9,Compliant,0,No,No",
        'Hold and Dead air,10,"Hold script, Hold threshold, Unnecessary Hold",5,,',
        "Right action taken,0,Inaccurate Escalation,,No,Yes",
      ].join("\n")
    );

    expect(table.parameters.map((p) => p.name)).toEqual([
      "Opening and Closing",
      "Hold and Dead air",
      "Right action taken",
    ]);
    expect(table.parameters[0]).toEqual({
      name: "Opening and Closing",
      maxScore: 9,
      fatalOnDeviation: false,
      rules: [{ subReason: "Script & Guidelines adherence", deduction: 3, fatal: false }],
    });
    expect(table.parameters[1].rules).toEqual([
      {
        subReason: "Hold script, Hold threshold, Unnecessary Hold",
        deduction: 5,
        fatal: false,
      },
    ]);
    expect(table.parameters[2]).toEqual({
      name: "Right action taken",
      maxScore: 0,
      fatalOnDeviation: true,
      rules: [{ subReason: "Inaccurate Escalation", deduction: 0, fatal: false }],
    });
  });

  it("always offers Compliant last", () => {
    const table = parseRuleTable(
      [HEADER, "Properties,15,Notes,8,No,No", "Properties,15,FD Properties,7,Yes,No"].join("\n")
    );
    expect(selectableReasons(table.parameters[0])).toEqual(["Notes", "FD Properties", "Compliant"]);
    expect(table.parameters[0].rules[1].fatal).toBe(true);
  });

  it("reports invalid cells with their line number", () => {
    try {
      parseRuleTable([HEADER, "Properties,15,Notes,abc,No,No"].join("\n"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.message).toBe("scoring rules: righe non valide");
        expect(err.issues).toEqual(["riga 2: Deduction: numero >= 0 atteso"]);
      }
    }
  });

  it("rejects an unknown fatal flag", () => {
    try {
      parseRuleTable([HEADER, "Properties,15,Notes,8,maybe,No"].join("\n"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual(['riga 2: Fatal: valore Yes/No atteso, trovato "maybe"']);
      }
    }
  });

  it("rejects inconsistent max scores", () => {
    try {
      parseRuleTable(
        [HEADER, "Properties,15,Notes,8,No,No", "Properties,10,FD Properties,7,No,No"].join("\n")
      );
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual(["Properties: Max Score incoerente (15 / 10)"]);
      }
    }
  });

  it("rejects an empty table", () => {
    expect(() => parseRuleTable(HEADER)).toThrow("scoring rules: nessun parametro configurato");
  });
});

describe("loadRuleTable", () => {
  it("loads the shipped rule table", async () => {
    const table = await loadRuleTable(
      path.join(__dirname, "..", "..", "data", "scoring_rules.csv")
    );
    expect(table.parameters).toHaveLength(8);
    expect(table.parameters.reduce((sum, p) => sum + p.maxScore, 0)).toBe(100);
    expect(
      table.parameters.filter((p) => p.fatalOnDeviation).map((p) => p.name)
    ).toEqual(["Correct and Complete Resolution", "Right action taken"]);

    const opening = table.parameters[0];
    expect(opening.name).toBe("Opening and Closing");
    expect(opening.maxScore).toBe(9);
    expect(opening.rules[0]).toEqual({
      subReason: "Script & Guidelines adherence",
      deduction: 3,
      fatal: false,
    });
  });
});
