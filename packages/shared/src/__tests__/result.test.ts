import { describe, expect, it } from "vitest";
import { Err, isErr, isOk, Ok, type Result } from "../types/result.js";

describe("Result", () => {
  it("wraps values and errors", () => {
    expect(Ok(3)).toEqual({ ok: true, value: 3 });
    expect(Err("boom")).toEqual({ ok: false, error: "boom" });
  });

  it("narrows with the type guards", () => {
    const results: Result<number, string>[] = [Ok(1), Err("bad"), Ok(2)];

    expect(results.filter(isOk).map((r) => r.value)).toEqual([1, 2]);
    expect(results.filter(isErr).map((r) => r.error)).toEqual(["bad"]);
  });
});
