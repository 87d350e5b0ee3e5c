import { describe, expect, it } from "vitest";

import { createMemoryLogger } from "@/utils/logger";

import { ParsingContext } from "./context";
import { createCyclePlaceholder, createDepthPlaceholder } from "./guard";

describe("createCyclePlaceholder", () => {
  it("registers a circular placeholder and warns", () => {
    const context = new ParsingContext();

    const placeholder = createCyclePlaceholder(
      "Node",
      "Node -> Node",
      context,
    );

    expect(placeholder).toMatchObject({
      name: "Node",
      type: "object",
      description: "[Circular reference detected: Node -> Node]",
      isCircularRef: true,
      circularRefPath: "Node -> Node",
    });
    expect(context.lookup("Node")).toBe(placeholder);
    expect(context.warningMessages()).toEqual([
      "[cycle-detected] Circular reference detected: Node -> Node",
    ]);
  });

  it("reuses the placeholder already registered for the name", () => {
    const context = new ParsingContext();

    const first = createCyclePlaceholder("Node", "Node -> Node", context);
    const second = createCyclePlaceholder("Node", "Node -> Node", context);

    expect(second).toBe(first);
    expect(context.warnings).toHaveLength(2);
  });

  it("records without logging once the cycle limit is reached", () => {
    const logger = createMemoryLogger();
    const context = new ParsingContext({ maxCycles: 1, logger });
    context.noteCycle("A -> A");
    context.noteCycle("A -> A");
    logger.entries.length = 0;

    createCyclePlaceholder("A", "A -> A", context);

    expect(logger.entries).toEqual([]);
    expect(context.warnings).toEqual([
      { code: "cycle-detected", message: "Circular reference detected: A -> A" },
    ]);
  });
});

describe("createDepthPlaceholder", () => {
  it("marks anonymous nodes without registering them", () => {
    const context = new ParsingContext({ maxDepth: 5 });

    const placeholder = createDepthPlaceholder(undefined, context);

    expect(placeholder).toMatchObject({
      type: "object",
      description: "[Maximum recursion depth (5) exceeded for 'anonymous']",
      isCircularRef: true,
      circularRefPath: "<anonymous> -> MAX_DEPTH_EXCEEDED",
    });
    expect(placeholder.name).toBeUndefined();
    expect(context.schemas.size).toBe(0);
    expect(context.warningMessages()).toEqual([
      "[max-depth-exceeded] Maximum recursion depth (5) exceeded while parsing 'anonymous'",
    ]);
  });

  it("registers named nodes when the name is free", () => {
    const context = new ParsingContext({ maxDepth: 5 });

    const placeholder = createDepthPlaceholder("Deep", context);

    expect(placeholder.circularRefPath).toBe("Deep -> MAX_DEPTH_EXCEEDED");
    expect(context.lookup("Deep")).toBe(placeholder);
  });
});
