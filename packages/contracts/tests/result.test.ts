import { describe, expect, it } from "vitest";
import { Err, Ok, Result } from "../src";

describe("Result", () => {
  it("maps and chains Ok values", () => {
    const res = Ok<number, string>(2)
      .map((n) => n * 3)
      .flatMap((n): Result<number, string> => (n > 5 ? Ok(n) : Err("small")));
    expect(res.getOrThrow()).toBe(6);
  });

  it("short-circuits on Err", () => {
    let calls = 0;
    const res = Err<number, string>("boom")
      .map((n) => {
        calls++;
        return n + 1;
      })
      .flatMap((n) => Ok<number, string>(n));
    expect(calls).toBe(0);
    expect(res.isErr()).toBe(true);
    expect(res.mapErr((e) => e.toUpperCase()).error).toBe("BOOM");
  });

  it("captures thrown errors", () => {
    const res = Result.fromThrowable(
      () => JSON.parse("{"),
      () => "parse failed",
    );
    expect(res.success).toBe(false);
    expect(res.error).toBe("parse failed");
  });

  it("rethrows the stored error from getOrThrow", () => {
    const failure = new Error("nope");
    expect(() => Err(failure).getOrThrow()).toThrow(failure);
  });

  it("throws when reading the wrong side", () => {
    expect(() => Ok(1).error).toThrow("Cannot access error of Ok Result");
    expect(() => Err("x").value).toThrow("Cannot access value of Err Result");
  });
});
