import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defineConfig, loadIrkitConfig, parseIrkitConfig } from "./config";
import { ConfigError } from "./errors";

describe("parseIrkitConfig", () => {
  it("applies defaults", () => {
    expect(parseIrkitConfig({ spec: "./api.yaml" })).toEqual({
      spec: "./api.yaml",
      validate: true,
      maxDepth: 100,
      debugCycles: false,
      maxCycles: 0,
    });
  });

  it("keeps path filters and headers", () => {
    const config = parseIrkitConfig(
      defineConfig({
        spec: "https://api.example.test/openapi.json",
        headers: { Authorization: "Bearer test-token" },
        include: ["/users/**"],
        exclude: ["/internal/**"],
        validate: false,
      }),
    );

    expect(config.headers).toEqual({ Authorization: "Bearer test-token" });
    expect(config.include).toEqual(["/users/**"]);
    expect(config.exclude).toEqual(["/internal/**"]);
    expect(config.validate).toBe(false);
  });

  it("lists every invalid field", () => {
    const parse = () => parseIrkitConfig({ spec: "", maxDepth: 0 });

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow("Invalid configuration in configuration:");
    expect(parse).toThrow("  - spec: OpenAPI spec path or URL is required");
    expect(parse).toThrow("  - maxDepth:");
  });

  it("names the config file in errors", () => {
    expect(() => parseIrkitConfig({}, "irkit.config.ts")).toThrow(
      "Invalid configuration in irkit.config.ts:",
    );
  });
});

describe("loadIrkitConfig", () => {
  const testDir = join(__dirname, ".test-config");
  const configPath = join(testDir, "irkit.config.ts");

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("throws when no config file exists", async () => {
    await expect(
      loadIrkitConfig({ configPath: join(testDir, "nonexistent.config.ts") }),
    ).rejects.toThrow("No configuration found");
  });

  it("throws when the config is invalid", async () => {
    await writeFile(
      configPath,
      `
			export default {
				spec: "",
			}
		`,
      "utf-8",
    );

    await expect(loadIrkitConfig({ configPath })).rejects.toThrow(
      "Invalid configuration",
    );
  });

  it("loads and validates a config file", async () => {
    await writeFile(
      configPath,
      `
			export default {
				spec: "./api.yaml",
				maxDepth: 5,
			}
		`,
      "utf-8",
    );

    const result = await loadIrkitConfig({ configPath, dotenv: false });

    expect(result.config).toEqual({
      spec: "./api.yaml",
      validate: true,
      maxDepth: 5,
      debugCycles: false,
      maxCycles: 0,
    });
    expect(result.configPath).toBe(configPath);
  });

  it("lets overrides win over the file", async () => {
    await writeFile(
      configPath,
      `
			export default {
				spec: "./api.yaml",
				validate: true,
			}
		`,
      "utf-8",
    );

    const result = await loadIrkitConfig({
      configPath,
      dotenv: false,
      overrides: { spec: "./other.yaml", validate: false },
    });

    expect(result.config.spec).toBe("./other.yaml");
    expect(result.config.validate).toBe(false);
  });
});
