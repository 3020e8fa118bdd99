import { describe, it, expect, vi } from "vitest";
import { MongoServerError } from "mongodb";
import { isDuplicateKeyError, parseRows } from "../store/mongoStore.js";
import { parseUserRow } from "../validation.js";

describe("isDuplicateKeyError", () => {
  it("matches E11000 server errors only", () => {
    expect(isDuplicateKeyError(new MongoServerError({ message: "E11000 duplicate key error", code: 11000 }))).toBe(true);
    expect(isDuplicateKeyError(new MongoServerError({ message: "not primary", code: 10107 }))).toBe(false);
    expect(isDuplicateKeyError(new Error("E11000 duplicate key error"))).toBe(false);
  });
});

describe("parseRows", () => {
  it("keeps valid rows and counts the rest", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const created = new Date("2024-01-01T00:00:00Z");

    const users = parseRows(
      [
        { id: 100, name: "Lan", timezone: "Asia/Ho_Chi_Minh", created_at: created },
        { id: "not a number", timezone: "UTC", created_at: created },
      ],
      parseUserRow,
      "user",
    );

    expect(users.rows).toEqual([{ id: 100, name: "Lan", timezone: "Asia/Ho_Chi_Minh", created_at: created }]);
    expect(users.dropped).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
