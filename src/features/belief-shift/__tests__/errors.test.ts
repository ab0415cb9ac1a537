import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  FatalRemoteError,
  MalformedCredenceError,
  RetriesExhaustedError,
  describeError,
  isBeliefShiftError,
} from "../errors";

describe("errors", () => {
  it("names each error after its class and tags it", () => {
    const error = new RetriesExhaustedError("credence failed after 3 attempts: 503", 3);
    expect(error.name).toBe("RetriesExhaustedError");
    expect(error._tag).toBe("RetriesExhaustedError");
    expect(error.attempts).toBe(3);
    expect(error).toBeInstanceOf(Error);
  });

  it("keeps the raw reply on a malformed credence", () => {
    const error = new MalformedCredenceError("not a number", "about half");
    expect(error.raw).toBe("about half");
    expect(error._tag).toBe("MalformedCredenceError");
  });

  it("carries the cause", () => {
    const cause = new Error("401 invalid x-api-key");
    expect(new FatalRemoteError("arguer turn 1 failed", { cause }).cause).toBe(cause);
  });

  it("recognises its own errors only", () => {
    expect(isBeliefShiftError(new ConfigurationError("bad"))).toBe(true);
    expect(isBeliefShiftError(new Error("bad"))).toBe(false);
    expect(isBeliefShiftError("bad")).toBe(false);
  });

  it("describes errors and other thrown values on one line", () => {
    expect(describeError(new ConfigurationError("rounds: too small"))).toBe("ConfigurationError: rounds: too small");
    expect(describeError(new TypeError("x is undefined"))).toBe("TypeError: x is undefined");
    expect(describeError(42)).toBe("42");
  });
});
