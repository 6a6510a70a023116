/**
 * Unit tests for output rendering
 */

import { describe, it, expect } from "vitest";
import { DocumentId, FieldValues, MetricsCollector, type DocumentOperation } from "@docfeed/sdk";
import { colorize, formatCounts, formatTypeStats, summarizeOperation } from "../src/lib/render.js";

const id = DocumentId.parse("id:shop:collection::c1");

describe("rendering", () => {
  describe("colorize", () => {
    it("should leave text alone when colors are off", () => {
      expect(colorize("ok", "green", false)).toBe("ok");
    });

    it("should wrap text in ANSI codes when enabled", () => {
      expect(colorize("bad", "red", true)).toBe("\x1b[31mbad\x1b[0m");
    });
  });

  describe("summarizeOperation", () => {
    it("should list put fields", () => {
      const op: DocumentOperation = {
        kind: "put",
        id,
        documentType: "collection",
        fields: new Map([
          ["items", FieldValues.array([FieldValues.string("a"), FieldValues.string("b")])],
          ["tags", FieldValues.weightedSet([{ value: FieldValues.string("red"), weight: 4 }])],
        ]),
      };
      expect(summarizeOperation(op)).toBe('put id:shop:collection::c1 items=["a","b"] tags={"red":4}');
    });

    it("should truncate long values", () => {
      const op: DocumentOperation = {
        kind: "put",
        id,
        documentType: "collection",
        fields: new Map([["items", FieldValues.array([FieldValues.string("z".repeat(100))])]]),
      };
      const summary = summarizeOperation(op);
      expect(summary).toBe(`put id:shop:collection::c1 items=["${"z".repeat(75)}...`);
    });

    it("should list update kinds per field", () => {
      const op: DocumentOperation = {
        kind: "update",
        id,
        documentType: "collection",
        fieldUpdates: [
          {
            field: "items",
            updates: [
              { kind: "add", value: FieldValues.string("c"), weight: 1 },
              { kind: "remove", value: FieldValues.string("a") },
            ],
          },
        ],
        createIfNonExistent: false,
        condition: "collection.items",
      };
      expect(summarizeOperation(op)).toBe(
        'update id:shop:collection::c1 items:add,remove if "collection.items"'
      );
    });

    it("should print a bare remove", () => {
      expect(summarizeOperation({ kind: "remove", id })).toBe("remove id:shop:collection::c1");
    });
  });

  describe("formatCounts", () => {
    it("should count each kind", () => {
      const ops: DocumentOperation[] = [
        { kind: "remove", id },
        { kind: "remove", id },
        { kind: "update", id, documentType: "collection", fieldUpdates: [], createIfNonExistent: true },
      ];
      expect(formatCounts(ops)).toEqual(["put: 0", "update: 1", "remove: 2", "total: 3"]);
    });
  });

  describe("formatTypeStats", () => {
    it("should render one line per type with error counts", () => {
      const metrics = new MetricsCollector();
      metrics.recordOperation("zeta", "put", 2, 1);
      metrics.recordOperation("alpha", "remove", 0, 3);
      metrics.recordError("alpha", "E_STRUCTURE");

      expect(formatTypeStats(metrics)).toEqual([
        "alpha: 1 operations (0 put, 0 update, 1 remove), 0 fields, p95 3.00ms",
        "  errors: E_STRUCTURE=1",
        "zeta: 1 operations (1 put, 0 update, 0 remove), 2 fields, p95 1.00ms",
      ]);
    });
  });
});
