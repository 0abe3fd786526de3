import { describe, expect, it } from "vitest";
import { parseAddress, parseAddressList, splitAddressList } from "../../../src/providers/address-parser.js";

describe("parseAddress", () => {
  it("splits display name and address", () => {
    expect(parseAddress("Jane Doe <jane@example.com>")).toEqual({ name: "Jane Doe", email: "jane@example.com" });
    expect(parseAddress('"Doe, Jane" <jane@example.com>')).toEqual({
      name: "Doe, Jane",
      email: "jane@example.com",
    });
  });

  it("handles addresses without a name", () => {
    expect(parseAddress("<jane@example.com>")).toEqual({ name: null, email: "jane@example.com" });
    expect(parseAddress(" jane@example.com ")).toEqual({ name: null, email: "jane@example.com" });
  });

  it("keeps text that is not an address as the name", () => {
    expect(parseAddress("undisclosed-recipients:;")).toEqual({ name: "undisclosed-recipients:;", email: null });
  });

  it("returns nothing for empty input", () => {
    expect(parseAddress("")).toEqual({ name: null, email: null });
    expect(parseAddress(undefined)).toEqual({ name: null, email: null });
  });
});

describe("splitAddressList", () => {
  it("ignores commas inside quotes and angle brackets", () => {
    expect(splitAddressList('a@example.com, "Smith, Bob" <bob@example.com>,, <c@example.com>')).toEqual([
      "a@example.com",
      '"Smith, Bob" <bob@example.com>',
      "<c@example.com>",
    ]);
  });
});

describe("parseAddressList", () => {
  it("parses every entry", () => {
    expect(parseAddressList('a@example.com, "Smith, Bob" <bob@example.com>')).toEqual([
      { name: null, email: "a@example.com" },
      { name: "Smith, Bob", email: "bob@example.com" },
    ]);
    expect(parseAddressList(null)).toEqual([]);
  });
});
