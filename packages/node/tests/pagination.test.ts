/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads what encodeCursor wrote", () => {
    expect(decodeCursor(encodeCursor("position", 42))).toEqual({
      field: "position",
      value: 42,
    });
  });

  it("returns undefined for invalid base64", () => {
    expect(decodeCursor("!!!not-base64!!!")).toBeUndefined();
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when the value is not a number", () => {
    const stringValue = Buffer.from(JSON.stringify({ f: "position", v: "4" })).toString(
      "base64url",
    );
    expect(decodeCursor(stringValue)).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    const arr = Buffer.from(JSON.stringify([1, 2])).toString("base64url");
    expect(decodeCursor(arr)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

describe("paginate", () => {
  const items = Array.from({ length: 12 }, (_, i) => ({ position: i + 1 }));
  const key = (item: { position: number }): number => item.position;

  it("returns the first page with a cursor when more remain", () => {
    const page = paginate(items, { limit: 5 }, key, "position");

    expect(page.data.map(key)).toEqual([1, 2, 3, 4, 5]);
    expect(page.pagination.hasMore).toBe(true);
    expect(page.pagination.cursor).toBe(encodeCursor("position", 5));
  });

  it("continues after the cursor and compares numerically", () => {
    const page = paginate(
      items,
      { cursor: encodeCursor("position", 9), limit: 5 },
      key,
      "position",
    );

    expect(page.data.map(key)).toEqual([10, 11, 12]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor for another field", () => {
    const page = paginate(
      items,
      { cursor: encodeCursor("version", 9), limit: 2 },
      key,
      "position",
    );

    expect(page.data.map(key)).toEqual([1, 2]);
  });
});
