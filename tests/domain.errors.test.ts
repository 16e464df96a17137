import { describe, it, expect } from "vitest";
import {
  AssertionFailure,
  ComparisonMismatch,
  IoError,
  RpcApplicationError,
  RunnerError,
  ValidationError,
  errorMessage,
} from "../src/domain/errors.js";

describe("RunnerError hierarchy", () => {
  it("prefixes file-scoped errors with the path", () => {
    const err = new ValidationError("missing ENDPOINT section", "/t/a.gctf");
    expect(err.message).toBe("/t/a.gctf: missing ENDPOINT section");
    expect(err.file).toBe("/t/a.gctf");
    expect(err.kind).toBe("validation");
    expect(err.name).toBe("ValidationError");
    expect(err).toBeInstanceOf(RunnerError);
    expect(new IoError("cannot read").message).toBe("cannot read");
  });

  it("summarises failures for the report", () => {
    expect(new RpcApplicationError({ code: 16, message: "no token" }, 80, "").message).toBe("call failed: UNAUTHENTICATED: no token");
    expect(new ComparisonMismatch({}, {}, ["a", "b"]).message).toBe("response mismatch (2 differences)");
    const groups = [
      { index: 0, passed: true, results: [] },
      { index: 1, passed: false, results: [] },
    ];
    expect(new AssertionFailure(groups).message).toBe("1 of 2 assertion group(s) failed");
  });

  it("extracts messages from anything thrown", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage("plain")).toBe("plain");
  });
});
