import { describe, expect, it } from "vitest";

import {
  ConfigError,
  IrkitError,
  StructuralError,
  errorMessage,
  formatWarning,
} from "./errors";

describe("error classes", () => {
  it("tags structural errors", () => {
    const error = new StructuralError("bad document");

    expect(error).toBeInstanceOf(IrkitError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("structural");
    expect(error.name).toBe("StructuralError");
    expect(error.message).toBe("bad document");
  });

  it("tags config errors and keeps the cause", () => {
    const cause = new Error("root");
    const error = new ConfigError("bad config", { cause });

    expect(error.code).toBe("config");
    expect(error.cause).toBe(cause);
  });
});

describe("formatWarning", () => {
  it("prefixes the code", () => {
    expect(
      formatWarning({ code: "cycle-detected", message: "A -> A" }),
    ).toBe("[cycle-detected] A -> A");
  });
});

describe("errorMessage", () => {
  it("reads Error messages", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies anything else", () => {
    expect(errorMessage(42)).toBe("42");
  });
});
