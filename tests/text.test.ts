import { describe, expect, it } from "vitest";
import { formatBytes, splitMessage, stripQuotes, truncate } from "../src/utils/text.js";

describe("splitMessage", () => {
  it("keeps short text whole", () => {
    expect(splitMessage("hello", 10)).toEqual(["hello"]);
  });

  it("prefers paragraph breaks", () => {
    expect(splitMessage("aaaaaa\n\nbbbbbb", 10)).toEqual(["aaaaaa", "bbbbbb"]);
  });

  it("falls back to spaces and then to a hard cut", () => {
    expect(splitMessage("aaaa bbbb cccc", 10)).toEqual(["aaaa bbbb", "cccc"]);
    expect(splitMessage("abcdefghijkl", 5)).toEqual(["abcde", "fghij", "kl"]);
  });
});

describe("stripQuotes", () => {
  it("removes one pair of matching quotes", () => {
    expect(stripQuotes(' "text" ')).toBe("text");
    expect(stripQuotes("«текст»")).toBe("текст");
    expect(stripQuotes("'a' and 'b'")).toBe("a' and 'b");
    expect(stripQuotes('"open')).toBe('"open');
  });
});

describe("truncate and formatBytes", () => {
  it("truncates with a suffix", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
    expect(truncate("abc", 3)).toBe("abc");
  });

  it("formats sizes", () => {
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(3 * 1024 * 1024)).toBe("3.0 MB");
  });
});
