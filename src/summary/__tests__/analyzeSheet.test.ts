import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { analyzeRows, analyzeSheet } from "../analyzeSheet.js";
import { SheetTitleCache } from "../../adapters/sheetTitles.js";
import { MemoryTabularStore } from "../../test/MemoryTabularStore.js";

describe("analyzeRows", () => {
  it("reports an empty sheet", () => {
    assert.deepEqual(analyzeRows([["Менеджер"]]), { kind: "diagnostic", message: "Лист пуст" });
  });

  it("reports a missing manager column", () => {
    assert.deepEqual(analyzeRows([["Дата"], ["1"]]), {
      kind: "diagnostic",
      message: "Не найдена колонка \"Менеджер\""
    });
  });

  it("starts scanning below a header found on the second row", () => {
    const result = analyzeRows([["Отчёт за март"], ["Менеджер", "Договор"], ["Иванов", "да"]]);
    assert.deepEqual(result, { kind: "rows", rows: [["Иванов", 1, 0, 0, 1, 0, 0, 0, 0, 0, 1, 0, 0]] });
  });
});

describe("analyzeSheet", () => {
  it("resolves the sheet name and aggregates it", async () => {
    const store = new MemoryTabularStore();
    store.setSheet("src", "Март 2024", [["Менеджер", "Метки"], ["Иванов", "nib"]]);

    const result = await analyzeSheet(store, new SheetTitleCache(store), "src", "март2024");
    assert.deepEqual(result, { kind: "rows", rows: [["Иванов", 1, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0]] });
  });

  it("returns diagnostics for an empty or unknown name without reading", async () => {
    const store = new MemoryTabularStore();
    store.setSheet("src", "Январь", [["Менеджер"], ["Иванов"]]);
    const titles = new SheetTitleCache(store);

    assert.deepEqual(await analyzeSheet(store, titles, "src", ""), {
      kind: "diagnostic",
      message: "Нет листа (пусто в Settings)"
    });
    assert.deepEqual(await analyzeSheet(store, titles, "src", "Май"), {
      kind: "diagnostic",
      message: "❌ Лист \"Май\" не найден"
    });
    assert.equal(store.calls.filter((c) => c.op === "get").length, 0);
  });

  it("propagates read failures", async () => {
    const store = new MemoryTabularStore();
    store.setSheet("src", "Январь", [["Менеджер"], ["Иванов"]]);
    store.failWith = (call) => (call.op === "get" ? new Error("boom") : undefined);

    await assert.rejects(analyzeSheet(store, new SheetTitleCache(store), "src", "Январь"), /boom/);
  });
});
