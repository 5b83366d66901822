import { describe, expect, it } from "vitest";
import { combineOutcomes, splitSelectors } from "../src/tools/containers.js";

describe("splitSelectors", () => {
  it("splits on commas and drops blanks", () => {
    expect(splitSelectors(" 200, pve1/web ,,proxy ")).toEqual(["200", "pve1/web", "proxy"]);
    expect(splitSelectors(" , ")).toEqual([]);
  });
});

describe("combineOutcomes", () => {
  it("returns a single outcome unchanged", () => {
    const only = { status: "success" as const, result: { vmid: 200 } };
    expect(combineOutcomes(["200"], [only])).toBe(only);
  });

  it("lets the worst status win and keeps every target", () => {
    const combined = combineOutcomes(
      ["200", "201", "202"],
      [
        { status: "success" },
        { status: "timed_out", error: { kind: "TimedOut", message: "slow" } },
        { status: "failed", error: { kind: "NotFound", message: "No container matches '202'" } },
      ]
    );

    expect(combined).toEqual({
      status: "failed",
      error: { kind: "NotFound", message: "No container matches '202'" },
      result: {
        targets: [
          { selector: "200", status: "success" },
          { selector: "201", status: "timed_out", error: { kind: "TimedOut", message: "slow" } },
          { selector: "202", status: "failed", error: { kind: "NotFound", message: "No container matches '202'" } },
        ],
      },
    });
  });
});
