import { describe, expect, it } from "vitest";
import {
  isBroadQueryIntent,
  normalizeUtterance,
  sharesAnyToken,
  tokenize,
  truncateWithEllipsis,
} from "../src/utils/text.js";

describe("text utils", () => {
  it("tokenizes lowercased words of two or more characters", () => {
    expect(tokenize("A quick AI demo, 24/7!")).toEqual(["quick", "ai", "demo", "24"]);
  });

  it("adds a singular variant for plural words", () => {
    expect(tokenize("Services business")).toEqual(["services", "service", "business"]);
  });

  it("keeps apostrophes inside words", () => {
    expect(tokenize("That's all")).toEqual(["that's", "all"]);
  });

  it("detects shared tokens", () => {
    expect(sharesAnyToken(new Set(["demo", "call"]), new Set(["call"]))).toBe(true);
    expect(sharesAnyToken(new Set(["demo"]), new Set(["pricing"]))).toBe(false);
  });

  it("detects broad summary intent", () => {
    expect(isBroadQueryIntent("Give me an overview of the company")).toBe(true);
    expect(isBroadQueryIntent("What is the office address?")).toBe(false);
  });

  it("truncates with an ellipsis only when longer than the limit", () => {
    expect(truncateWithEllipsis("abcdef", 4)).toBe("abcd...");
    expect(truncateWithEllipsis("abcd", 4)).toBe("abcd");
  });

  it("normalizes utterances", () => {
    expect(normalizeUtterance("  HeLLo \n")).toBe("hello");
  });
});
