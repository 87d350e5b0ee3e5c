import { describe, expect, it } from "vitest";

import {
  capitalize,
  sanitizeClassName,
  sanitizeModuleName,
  singularize,
  toCamelCase,
  toEnumMemberName,
  toPascalCase,
} from "./naming";

describe("toPascalCase", () => {
  it("converts kebab-case to PascalCase", () => {
    expect(toPascalCase("get-user")).toBe("GetUser");
  });

  it("converts snake_case to PascalCase", () => {
    expect(toPascalCase("get_user")).toBe("GetUser");
  });

  it("converts camelCase to PascalCase", () => {
    expect(toPascalCase("getUser")).toBe("GetUser");
  });

  it("handles multiple separators", () => {
    expect(toPascalCase("get-user_data")).toBe("GetUserData");
  });
});

describe("toCamelCase", () => {
  it("converts kebab-case to camelCase", () => {
    expect(toCamelCase("get-user")).toBe("getUser");
  });
});

describe("capitalize", () => {
  it("upper-cases only the first character", () => {
    expect(capitalize("petType")).toBe("PetType");
    expect(capitalize("t")).toBe("T");
    expect(capitalize("")).toBe("");
  });
});

describe("sanitizeClassName", () => {
  it("joins words into PascalCase", () => {
    expect(sanitizeClassName("user_profile")).toBe("UserProfile");
    expect(sanitizeClassName("Log.costs")).toBe("LogCosts");
  });

  it("keeps inner capitals", () => {
    expect(sanitizeClassName("OuterSchema")).toBe("OuterSchema");
  });

  it("prefixes names starting with a digit", () => {
    expect(sanitizeClassName("2fa-settings")).toBe("_2faSettings");
  });
});

describe("sanitizeModuleName", () => {
  it("splits PascalCase into kebab-case", () => {
    expect(sanitizeModuleName("UserProfile")).toBe("user-profile");
    expect(sanitizeModuleName("PetTypeEnum")).toBe("pet-type-enum");
  });

  it("keeps acronyms together", () => {
    expect(sanitizeModuleName("HTTPResponseCode")).toBe("http-response-code");
  });

  it("separates trailing digits", () => {
    expect(sanitizeModuleName("UserProfile1")).toBe("user-profile-1");
  });

  it("handles a single capital", () => {
    expect(sanitizeModuleName("A")).toBe("a");
  });
});

describe("singularize", () => {
  it("drops one trailing s", () => {
    expect(singularize("Items")).toBe("Item");
    expect(singularize("Details")).toBe("Detail");
  });

  it("leaves words that only look plural", () => {
    expect(singularize("Status")).toBe("Status");
    expect(singularize("Bus")).toBe("Bus");
    expect(singularize("Address")).toBe("Address");
  });

  it("leaves short words", () => {
    expect(singularize("Ids")).toBe("Ids");
  });
});

describe("toEnumMemberName", () => {
  it("upper-snake-cases string values", () => {
    expect(toEnumMemberName("in-progress")).toBe("IN_PROGRESS");
    expect(toEnumMemberName("a.b c")).toBe("A_B_C");
    expect(toEnumMemberName("cat")).toBe("CAT");
  });

  it("prefixes numeric values", () => {
    expect(toEnumMemberName(404)).toBe("VALUE_404");
  });

  it("names the empty string", () => {
    expect(toEnumMemberName("")).toBe("EMPTY");
  });
});
