import { describe, expect, it } from "vitest";

import { createSchema } from "@/ir/schema";

import { ParsingContext } from "./context";
import {
  inlineObjectName,
  promoteInlineEnum,
  promoteInlineObject,
} from "./promotion";

function inlineObject(keys: string[]) {
  const properties = Object.fromEntries(
    keys.map((key) => [key, createSchema({ type: "string" })]),
  );
  return createSchema({ type: "object", properties });
}

describe("inlineObjectName", () => {
  it("adds a Data suffix to plain property names", () => {
    expect(inlineObjectName("details", inlineObject(["info"]))).toBe(
      "DetailData",
    );
  });

  it("keeps names of objects carrying an id", () => {
    expect(inlineObjectName("owner", inlineObject(["id", "name"]))).toBe(
      "Owner",
    );
    expect(inlineObjectName("owner", inlineObject(["ownerId"]))).toBe("Owner");
  });

  it("keeps names that already read as an entity", () => {
    expect(inlineObjectName("items", inlineObject(["a"]))).toBe("Item");
    expect(inlineObjectName("address_info", inlineObject(["a"]))).toBe(
      "AddressInfo",
    );
  });
});

describe("promoteInlineObject", () => {
  it("registers the object and returns a slim reference", () => {
    const context = new ParsingContext();
    const details = inlineObject(["info"]);

    const slim = promoteInlineObject("Outer", "details", details, context);

    expect(details.name).toBe("DetailData");
    expect(context.lookup("DetailData")).toBe(details);
    expect(slim).toMatchObject({ name: "details", type: "DetailData" });
    expect(slim?.refersToSchema).toBe(details);
  });

  it("qualifies the name with the parent when it is taken", () => {
    const context = new ParsingContext({
      components: { schemas: { DetailData: { type: "object" } } },
    });

    const slim = promoteInlineObject(
      "Outer",
      "details",
      inlineObject(["info"]),
      context,
    );

    expect(slim?.type).toBe("OuterDetailData");
  });

  it("adds a counter when the qualified name is taken too", () => {
    const context = new ParsingContext();
    context.register("DetailData", createSchema({ name: "DetailData" }));
    context.register(
      "OuterDetailData",
      createSchema({ name: "OuterDetailData" }),
    );

    const slim = promoteInlineObject(
      "Outer",
      "details",
      inlineObject(["info"]),
      context,
    );

    expect(slim?.type).toBe("OuterDetailData1");
  });

  it("leaves non-objects, empty objects and arena schemas alone", () => {
    const context = new ParsingContext();
    const named = inlineObject(["a"]);
    named.name = "Named";
    context.register("Named", named);

    expect(
      promoteInlineObject("P", "s", createSchema({ type: "string" }), context),
    ).toBeUndefined();
    expect(
      promoteInlineObject("P", "o", createSchema({ type: "object" }), context),
    ).toBeUndefined();
    expect(promoteInlineObject("P", "n", named, context)).toBeUndefined();
  });
});

describe("promoteInlineEnum", () => {
  it("hoists the enum under {Parent}{Property}Enum", () => {
    const context = new ParsingContext();
    const status = createSchema({
      type: "string",
      enum: ["available", "sold"],
      isNullable: true,
    });

    const slim = promoteInlineEnum("Pet", "status", status, context);
    const hoisted = context.lookup("PetStatusEnum");

    expect(hoisted).toMatchObject({
      name: "PetStatusEnum",
      type: "string",
      enum: ["available", "sold"],
      description: "Enum for Pet.status",
    });
    expect(slim).toMatchObject({
      name: "status",
      type: "PetStatusEnum",
      isNullable: true,
    });
    expect(slim?.refersToSchema).toBe(hoisted);
  });

  it("adds a counter on collision", () => {
    const context = new ParsingContext();
    const values = () => createSchema({ type: "string", enum: ["a"] });

    promoteInlineEnum("Pet", "status", values(), context);
    const second = promoteInlineEnum("Pet", "status", values(), context);

    expect(second?.type).toBe("PetStatusEnum1");
  });

  it("skips discriminator properties", () => {
    const context = new ParsingContext();
    context.discriminatorProperties.add("Cat.petType");

    const slim = promoteInlineEnum(
      "Cat",
      "petType",
      createSchema({ type: "string", enum: ["cat"] }),
      context,
    );

    expect(slim).toBeUndefined();
    expect(context.schemas.size).toBe(0);
  });
});
