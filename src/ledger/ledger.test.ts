import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LedgerError } from "../errors";
import { IngestionLedger } from "./ledger";

describe("IngestionLedger", () => {
  let ledger: IngestionLedger;

  beforeEach(async () => {
    ledger = await IngestionLedger.open(":memory:");
  });

  afterEach(() => {
    try {
      ledger.close();
    } catch {
      // already closed by the test
    }
  });

  it("stores a document with its records in chunk order", async () => {
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, ["a_2", "a_1", "a_3"]);

    const doc = await ledger.find("a.json", "src-1");

    expect(doc?.version).toBe("v1");
    expect(doc?.records.map((r) => r.id)).toEqual(["a_2", "a_1", "a_3"]);
    expect(doc?.records[0]).toEqual({ id: "a_2", documentId: "a.json", documentSourceId: "src-1" });
  });

  it("replaces version and the full record set on upsert", async () => {
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, ["a_1", "a_2", "a_3"]);
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v2" }, ["a_1"]);

    const doc = await ledger.find("a.json", "src-1");
    expect(doc?.version).toBe("v2");
    expect(doc?.records.map((r) => r.id)).toEqual(["a_1"]);
    expect(await ledger.counts()).toEqual({ documents: 1, records: 1 });
  });

  it("keys documents by id and source", async () => {
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, ["a_1"]);
    await ledger.upsert({ id: "a.json", sourceId: "src-2", version: "v9" }, ["a_1"]);

    expect((await ledger.find("a.json", "src-1"))?.version).toBe("v1");
    expect((await ledger.find("a.json", "src-2"))?.version).toBe("v9");
    expect(await ledger.find("a.json", "src-3")).toBeUndefined();
    expect(await ledger.listSources()).toEqual(["src-1", "src-2"]);
    expect((await ledger.listBySource("src-2")).map((d) => d.version)).toEqual(["v9"]);
  });

  it("finds which document of a source holds a chunk key", async () => {
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, ["a_1", "a_2"]);
    await ledger.upsert({ id: "a.json", sourceId: "src-2", version: "v1" }, ["a_1"]);

    expect(await ledger.recordsWithKeys("src-1", ["a_2", "b_1"])).toEqual([
      { id: "a_2", documentId: "a.json", documentSourceId: "src-1" },
    ]);
    expect(await ledger.recordsWithKeys("src-1", [])).toEqual([]);
  });

  it("deletes a document together with its records", async () => {
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, ["a_1", "a_2"]);
    await ledger.upsert({ id: "b.json", sourceId: "src-1", version: "v1" }, ["b_1"]);

    await ledger.delete("a.json", "src-1");
    await ledger.delete("missing.json", "src-1");

    expect(await ledger.find("a.json", "src-1")).toBeUndefined();
    expect(await ledger.counts()).toEqual({ documents: 1, records: 1 });
  });

  it("hands out detached views", async () => {
    await ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, ["a_1"]);
    const view = await ledger.viewFor("src-1");

    await ledger.upsert({ id: "b.json", sourceId: "src-1", version: "v1" }, ["b_1"]);

    expect(view.list().map((d) => d.id)).toEqual(["a.json"]);
    expect(view.get("a.json")?.records.map((r) => r.id)).toEqual(["a_1"]);
    expect(view.get("b.json")).toBeUndefined();
  });

  it("wraps storage failures in LedgerError", async () => {
    ledger.close();
    await expect(ledger.find("a.json", "src-1")).rejects.toThrow(LedgerError);
    await expect(
      ledger.upsert({ id: "a.json", sourceId: "src-1", version: "v1" }, []),
    ).rejects.toThrow(LedgerError);
  });
});
