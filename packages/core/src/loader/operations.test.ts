import { describe, expect, it } from "vitest";

import { createSchema } from "@/ir/schema";
import { ParsingContext } from "@/parsing/context";

import {
  detectStreamFormat,
  generateOperationId,
  parseOperations,
  responseSchemaName,
} from "./operations";

import type { RawComponents } from "@/parsing/context";

function contextWith(components: RawComponents = {}): ParsingContext {
  return new ParsingContext({
    components: {
      schemas: {
        Pet: {
          type: "object",
          properties: { name: { type: "string" } },
        },
      },
      ...components,
    },
  });
}

describe("generateOperationId", () => {
  it("joins the method and path segments", () => {
    expect(generateOperationId("GET", "/users/{id}")).toBe("getUsersById");
    expect(generateOperationId("post", "/pet_owners")).toBe("postPetOwners");
  });
});

describe("responseSchemaName", () => {
  it("names success responses after the operation", () => {
    expect(responseSchemaName("GetPet", "200")).toBe("GetPetResponse");
    expect(responseSchemaName("GetPet", "2XX")).toBe("GetPetResponse");
  });

  it("adds the status code to every other response", () => {
    expect(responseSchemaName("GetPet", "404")).toBe("GetPet404Response");
    expect(responseSchemaName("GetPet", "default")).toBe(
      "GetPetDefaultResponse",
    );
  });
});

describe("detectStreamFormat", () => {
  it("matches stream media types case-insensitively", () => {
    expect(detectStreamFormat({ "Application/X-NDJSON": createSchema() })).toBe(
      "ndjson",
    );
    expect(detectStreamFormat({ "text/event-stream": createSchema() })).toBe(
      "event-stream",
    );
  });

  it("treats binary schemas as octet streams", () => {
    expect(
      detectStreamFormat({
        "application/json": createSchema({ type: "string", format: "binary" }),
      }),
    ).toBe("octet-stream");
    expect(
      detectStreamFormat({
        "application/json": createSchema({ type: "object" }),
      }),
    ).toBeUndefined();
  });
});

describe("parseOperations", () => {
  it("merges path-level and operation-level parameters", () => {
    const context = contextWith({
      parameters: {
        Limit: { name: "limit", in: "query", schema: { type: "integer" } },
      },
    });

    const [operation] = parseOperations(
      {
        "/pets/{petId}": {
          parameters: [
            { name: "petId", in: "path", schema: { type: "string" } },
          ],
          get: {
            operationId: "getPet",
            tags: ["pets"],
            parameters: [{ $ref: "#/components/parameters/Limit" }],
            responses: {
              "200": {
                description: "ok",
                content: {
                  "application/json": {
                    schema: { $ref: "#/components/schemas/Pet" },
                  },
                },
              },
            },
          },
        },
      },
      context,
    );

    expect(operation?.operationId).toBe("getPet");
    expect(operation?.method).toBe("get");
    expect(operation?.tags).toEqual(["pets"]);
    expect(
      operation?.parameters.map((p) => [p.name, p.in, p.required]),
    ).toEqual([
      ["petId", "path", true],
      ["limit", "query", false],
    ]);
    expect(operation?.parameters[1]?.schema.type).toBe("integer");
    expect(
      operation?.responses[0]?.content["application/json"],
    ).toBe(context.lookup("Pet"));
  });

  it("lets operation parameters override path parameters", () => {
    const [operation] = parseOperations(
      {
        "/pets": {
          parameters: [{ name: "limit", in: "query", description: "path" }],
          get: {
            parameters: [
              { name: "limit", in: "query", description: "op", required: true },
            ],
            responses: {},
          },
        },
      },
      contextWith(),
    );

    expect(operation?.parameters).toHaveLength(1);
    expect(operation?.parameters[0]).toMatchObject({
      name: "limit",
      description: "op",
      required: true,
    });
  });

  it("names inline request and response objects", () => {
    const context = contextWith();

    const [operation] = parseOperations(
      {
        "/pets": {
          post: {
            requestBody: {
              required: true,
              content: {
                "application/json": {
                  schema: {
                    type: "object",
                    properties: { name: { type: "string" } },
                  },
                },
              },
            },
            responses: {
              default: {
                description: "error",
                content: {
                  "application/json": {
                    schema: {
                      type: "object",
                      properties: { message: { type: "string" } },
                    },
                  },
                },
              },
            },
          },
        },
      },
      context,
    );

    expect(operation?.operationId).toBe("postPets");
    expect(operation?.requestBody?.required).toBe(true);
    expect(
      operation?.requestBody?.content["application/json"]?.name,
    ).toBe("PostPetsRequest");
    expect(context.lookup("PostPetsRequest")).toBe(
      operation?.requestBody?.content["application/json"],
    );
    expect(context.lookup("PostPetsDefaultResponse")?.properties.message?.type).toBe(
      "string",
    );
  });

  it("adds a counter when a synthesized name is taken", () => {
    const context = contextWith({
      schemas: { PostPetsRequest: { type: "string" } },
    });

    parseOperations(
      {
        "/pets": {
          post: {
            requestBody: {
              content: {
                "application/json": {
                  schema: {
                    type: "object",
                    properties: { name: { type: "string" } },
                  },
                },
              },
            },
          },
        },
      },
      context,
    );

    expect(context.lookup("PostPetsRequest1")?.type).toBe("object");
  });

  it("marks stream responses and leaves their schemas anonymous", () => {
    const context = contextWith();

    const [operation] = parseOperations(
      {
        "/events": {
          get: {
            responses: {
              "200": {
                content: {
                  "text/event-stream": {
                    schema: {
                      type: "object",
                      properties: { data: { type: "string" } },
                    },
                  },
                },
              },
            },
          },
        },
      },
      context,
    );

    expect(operation?.responses[0]).toMatchObject({
      statusCode: "200",
      stream: true,
      streamFormat: "event-stream",
    });
    expect(context.lookup("GetEventsResponse")).toBeUndefined();
  });

  it("skips operations with invalid parameters", () => {
    const context = contextWith();

    const operations = parseOperations(
      {
        "/pets": {
          get: { parameters: [{ in: "query" }], responses: {} },
          delete: { responses: {} },
        },
      },
      context,
    );

    expect(operations.map((operation) => operation.method)).toEqual([
      "delete",
    ]);
    expect(context.warningMessages()).toEqual([
      "[validation] Skipping operation parsing for GET /pets: Parameter is missing a 'name'",
    ]);
  });

  it("reports parameter references it cannot follow", () => {
    const context = contextWith();

    const [operation] = parseOperations(
      {
        "/pets": {
          get: {
            parameters: [{ $ref: "#/components/parameters/Nope" }],
            responses: {},
          },
        },
      },
      context,
    );

    expect(operation?.parameters).toEqual([]);
    expect(context.warningMessages()).toEqual([
      "[unresolvable-reference] Could not resolve $ref: #/components/parameters/Nope",
    ]);
  });
});
