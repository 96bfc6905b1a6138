import assert from "node:assert";
import { describe, test } from "node:test";

import { assemble } from "../../src/core/assembler/Assembler";
import { PipelineSimulator } from "../../src/core/pipeline/PipelineSimulator";
import { formatTraceCsv } from "../../src/core/tools/traceExport";

describe("formatTraceCsv", () => {
  test("quotes instruction text containing commas", () => {
    const simulator = new PipelineSimulator({ program: assemble("add x1, x0, x0") });
    simulator.run(2);

    assert.strictEqual(
      formatTraceCsv(simulator.getTrace()),
      'cycle,IF,ID,EX,MEM,WB\r\n1,"add x1, x0, x0",NOP,NOP,NOP,NOP\r\n2,NOP,"add x1, x0, x0",NOP,NOP,NOP\r\n',
    );
  });

  test("doubles embedded quotes", () => {
    const csv = formatTraceCsv([{ cycle: 9, IF: 'say "hi"', ID: "NOP", EX: "NOP", MEM: "NOP", WB: "a\nb" }]);
    assert.strictEqual(csv, 'cycle,IF,ID,EX,MEM,WB\r\n9,"say ""hi""",NOP,NOP,NOP,"a\nb"\r\n');
  });

  test("writes only the header for an empty trace", () => {
    assert.strictEqual(formatTraceCsv([]), "cycle,IF,ID,EX,MEM,WB\r\n");
  });
});
