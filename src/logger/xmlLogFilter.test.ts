// src/logger/xmlLogFilter.test.ts
import { describe, expect, it } from "vitest";
import { FILTERED, filterXmlForLog, snippet } from "./xmlLogFilter";

describe("filterXmlForLog", () => {
  it("masks filtered elements with or without a prefix", () => {
    const xml =
      '<a><wsse:Password Type="text">test-secret</wsse:Password>' +
      "<Password>test-secret</Password><user>bob</user></a>";

    expect(filterXmlForLog(xml, ["Password"])).toBe(
      `<a><wsse:Password Type="text">${FILTERED}</wsse:Password>` +
        `<Password>${FILTERED}</Password><user>bob</user></a>`
    );
  });

  it("returns the input untouched without filters", () => {
    expect(filterXmlForLog("<a>1</a>", [])).toBe("<a>1</a>");
    expect(filterXmlForLog(undefined, ["a"])).toBeUndefined();
  });
});

describe("snippet", () => {
  it("truncates long text and marks empty text", () => {
    expect(snippet("abcdef", 3)).toBe("abc…");
    expect(snippet("abc", 3)).toBe("abc");
    expect(snippet(undefined)).toBe("<empty>");
  });
});
