import { describe, it, expect } from "vitest";
import { createWindowGate } from "../window.js";

const at = (iso: string) => new Date(iso);

describe("createWindowGate", () => {
  it("is always open without a configured window", () => {
    const gate = createWindowGate({ start: null, end: null, timezone: "UTC", alwaysOn: false });
    expect(gate(at("2024-03-10T03:00:00Z"))).toBe(true);
  });

  it("is always open when ALWAYS_ON is set", () => {
    const gate = createWindowGate({ start: "08:00", end: "09:00", timezone: "UTC", alwaysOn: true });
    expect(gate(at("2024-03-10T20:00:00Z"))).toBe(true);
  });

  it("opens between start and end in the window's zone", () => {
    const gate = createWindowGate({ start: "08:00", end: "20:00", timezone: "Asia/Ho_Chi_Minh", alwaysOn: false });
    expect(gate(at("2024-03-10T00:59:00Z"))).toBe(false);
    expect(gate(at("2024-03-10T01:00:00Z"))).toBe(true);
    expect(gate(at("2024-03-10T12:59:00Z"))).toBe(true);
    expect(gate(at("2024-03-10T13:00:00Z"))).toBe(false);
  });

  it("wraps a window past midnight", () => {
    const gate = createWindowGate({ start: "22:00", end: "06:00", timezone: "UTC", alwaysOn: false });
    expect(gate(at("2024-03-10T23:00:00Z"))).toBe(true);
    expect(gate(at("2024-03-10T05:59:00Z"))).toBe(true);
    expect(gate(at("2024-03-10T06:00:00Z"))).toBe(false);
    expect(gate(at("2024-03-10T12:00:00Z"))).toBe(false);
  });

  it("treats equal start and end as open all day", () => {
    const gate = createWindowGate({ start: "07:00", end: "07:00", timezone: "UTC", alwaysOn: false });
    expect(gate(at("2024-03-10T15:00:00Z"))).toBe(true);
  });
});
