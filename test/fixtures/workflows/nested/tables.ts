import fs from "fs";
import { fileURLToPath } from "url";
import { StructuredDataset, defineWorkflow, types } from "../../../../src";

export const describeTable = defineWorkflow({
  inputs: { table: types.structuredDataset("csv"), label: types.string() },
  run: ({ table, label }) => {
    if (!(table instanceof StructuredDataset)) {
      throw new Error("table must be a structured dataset");
    }
    const rows = fs.readFileSync(fileURLToPath(table.uri), "utf-8").trim().split("\n").length - 1;
    return `${String(label)}: ${rows} rows from ${table.uri} (${table.format ?? "any"})`;
  },
});
