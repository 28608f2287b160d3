import { createHash } from "node:crypto";

import { describe, expect, it } from "vitest";

import { OutputValidator, aggregateHash, compareValidationRecords } from "../src/validation/output.js";
import { FakeWarehouseClient } from "./fixtures/fakes.js";

const NOW = new Date("2024-03-01T12:00:00Z");

describe("aggregateHash", () => {
  it("hashes the concatenated row hashes", () => {
    expect(aggregateHash(["10", "20"])).toBe(createHash("sha256").update("1020").digest("hex"));
    expect(aggregateHash([])).toBe(createHash("sha256").update("").digest("hex"));
  });
});

describe("OutputValidator", () => {
  it("captures row counts and hashes per model", async () => {
    const client = new FakeWarehouseClient([
      [/COUNT\(\*\) AS ROW_COUNT FROM PIPELINE_A\.orders/, [{ ROW_COUNT: "2" }]],
      [/ROW_HASH FROM PIPELINE_A\.orders/, [{ ROW_HASH: "-5" }, { ROW_HASH: "7" }]],
      [/FROM PIPELINE_A\.broken/, new Error("table does not exist")]
    ]);

    const records = await new OutputValidator(client).capture("PIPELINE_A", ["orders", "broken"]);

    expect(records).toEqual({
      orders: { model: "orders", schema: "PIPELINE_A", row_count: 2, aggregate_hash: aggregateHash(["-5", "7"]) }
    });
  });

  it("refuses identifiers that are not plain names", async () => {
    const client = new FakeWarehouseClient();
    await expect(new OutputValidator(client).rowCount("PIPELINE_A", "orders; drop table x")).rejects.toThrow(
      "Invalid identifier: PIPELINE_A.orders; drop table x"
    );
    expect(client.queries).toEqual([]);
  });
});

describe("compareValidationRecords", () => {
  const record = (rowCount: number | null, hash: string | null) => ({
    model: "orders",
    schema: "PIPELINE_A",
    row_count: rowCount,
    aggregate_hash: hash
  });

  it("passes matching models", () => {
    const report = compareValidationRecords({ orders: record(3, "h") }, { orders: record(3, "h") }, NOW);

    expect(report).toEqual({
      validatedAt: "2024-03-01T12:00:00.000Z",
      modelsValidated: 1,
      overallStatus: "PASS",
      results: [
        {
          model: "orders",
          schema: "PIPELINE_A",
          rowCountBaseline: 3,
          rowCountCandidate: 3,
          rowCountMatch: true,
          hashBaseline: "h",
          hashCandidate: "h",
          hashMatch: true,
          status: "PASS",
          error: null
        }
      ]
    });
  });

  it("explains each kind of mismatch", () => {
    const report = compareValidationRecords(
      { orders: record(3, "h1"), trades: record(1, "t") },
      { orders: record(3, "h2"), trades: record(2, "t"), positions: record(0, "p") },
      NOW
    );

    expect(report.overallStatus).toBe("FAIL");
    expect(report.results.map((result) => [result.model, result.error])).toEqual([
      ["orders", "Hash mismatch: baseline h1, candidate h2"],
      ["positions", "No baseline found for positions"],
      ["trades", "Row count mismatch: baseline 1, candidate 2"]
    ]);
  });

  it("fails when neither side has a hash", () => {
    const report = compareValidationRecords({ orders: record(3, null) }, { orders: record(3, null) }, NOW);
    expect(report.results[0]?.error).toBe("Hash mismatch: baseline null, candidate null");
  });

  it("ignores models that only exist in the baseline", () => {
    const report = compareValidationRecords({ orders: record(3, "h") }, {}, NOW);
    expect(report).toMatchObject({ modelsValidated: 0, overallStatus: "PASS", results: [] });
  });
});
