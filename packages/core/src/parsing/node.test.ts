import { describe, expect, it } from "vitest";

import {
  classifyNode,
  isJsonValue,
  isRawSchema,
  ownEntry,
  stringField,
  stringList,
} from "./node";

describe("classifyNode", () => {
  it("classifies non-objects as empty", () => {
    expect(classifyNode(undefined)).toEqual({ kind: "empty" });
    expect(classifyNode(true)).toEqual({ kind: "empty" });
    expect(classifyNode([])).toEqual({ kind: "empty" });
  });

  it("lets $ref win over everything else", () => {
    const raw = { $ref: "#/components/schemas/Pet", type: "object" };
    expect(classifyNode(raw)).toEqual({
      kind: "ref",
      ref: "#/components/schemas/Pet",
      raw,
    });
  });

  it("checks allOf, then anyOf, then oneOf", () => {
    expect(classifyNode({ anyOf: [], allOf: [] }).kind).toBe("allOf");
    expect(classifyNode({ oneOf: [], anyOf: [] }).kind).toBe("anyOf");
    expect(classifyNode({ oneOf: [] }).kind).toBe("oneOf");
  });

  it("keeps JSON enum values", () => {
    const node = classifyNode({ enum: ["a", null, 1] });
    expect(node).toEqual({
      kind: "enum",
      values: ["a", null, 1],
      raw: { enum: ["a", null, 1] },
    });
  });

  it("reads the declared or implied structural type", () => {
    expect(classifyNode({ type: "array" }).kind).toBe("array");
    expect(classifyNode({ items: {} }).kind).toBe("array");
    expect(classifyNode({ type: ["object", "null"] }).kind).toBe("object");
    expect(classifyNode({ properties: {} }).kind).toBe("object");
    expect(classifyNode({ type: "string" }).kind).toBe("scalar");
    expect(classifyNode({}).kind).toBe("scalar");
  });
});

describe("field readers", () => {
  it("recognizes records", () => {
    expect(isRawSchema({})).toBe(true);
    expect(isRawSchema(null)).toBe(false);
    expect(isRawSchema(["a"])).toBe(false);
  });

  it("recognizes JSON values", () => {
    expect(isJsonValue({ a: [1, "x", null, true] })).toBe(true);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(undefined)).toBe(false);
  });

  it("reads strings only", () => {
    expect(stringField({ format: "uuid" }, "format")).toBe("uuid");
    expect(stringField({ format: 1 }, "format")).toBeUndefined();
    expect(stringList(["a", 1, "b"])).toEqual(["a", "b"]);
    expect(stringList("a")).toEqual([]);
  });

  it("ignores inherited keys", () => {
    expect(ownEntry({ a: 1 }, "a")).toBe(1);
    expect(ownEntry<number>({}, "toString")).toBeUndefined();
  });
});
