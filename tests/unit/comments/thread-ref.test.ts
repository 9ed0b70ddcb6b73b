import { describe, it, expect } from "vitest";
import { parseThreadRef, formatThreadRef } from "../../../src/comments/thread-ref.js";
import {
  InvalidInputError,
  InvalidUrlError,
  MissingHostError,
} from "../../../src/lib/api-errors.js";

describe("parseThreadRef", () => {
  it("splits a URL into host and path", () => {
    expect(parseThreadRef("https://example.com/post")).toEqual({
      host: "example.com",
      path: "/post",
    });
  });

  it("keeps host case, port and trailing slash as given", () => {
    expect(parseThreadRef("https://Example.COM:8443/a/b/")).toEqual({
      host: "Example.COM:8443",
      path: "/a/b/",
    });
  });

  it("drops userinfo from the authority", () => {
    expect(parseThreadRef("https://user:pw@example.com/x").host).toBe("example.com");
  });

  it("ignores query and fragment", () => {
    expect(parseThreadRef("https://example.com/p?x=1#top")).toEqual({
      host: "example.com",
      path: "/p",
    });
  });

  it("percent-decodes the path", () => {
    expect(parseThreadRef("https://example.com/caf%C3%A9").path).toBe("/café");
  });

  it("returns an empty path for a bare origin", () => {
    expect(parseThreadRef("https://example.com")).toEqual({ host: "example.com", path: "" });
  });

  it("accepts scheme-relative URLs", () => {
    expect(parseThreadRef("//example.com/post")).toEqual({ host: "example.com", path: "/post" });
  });

  it("rejects a relative URL with MissingHostError", () => {
    expect(() => parseThreadRef("/relative/path")).toThrow(MissingHostError);
  });

  it("rejects an empty string with MissingHostError", () => {
    expect(() => parseThreadRef("")).toThrow(MissingHostError);
  });

  it("rejects an empty authority", () => {
    expect(() => parseThreadRef("file:///etc/hosts")).toThrow(MissingHostError);
  });

  it("rejects a malformed percent-escape", () => {
    expect(() => parseThreadRef("https://example.com/%zz")).toThrow(InvalidUrlError);
  });

  it("rejects whitespace in the host", () => {
    expect(() => parseThreadRef("https://exa mple.com/")).toThrow(InvalidUrlError);
  });

  it("rejects control characters", () => {
    expect(() => parseThreadRef("https://example.com/a\tb")).toThrow(InvalidUrlError);
  });

  it("keeps a space in the path", () => {
    expect(parseThreadRef("https://example.com/my post").path).toBe("/my post");
  });

  it("decodes an escaped byte that is not UTF-8 to the replacement character", () => {
    expect(parseThreadRef("https://example.com/%FF").path).toBe("/\uFFFD");
  });

  it("decodes escapes next to literal non-ASCII text", () => {
    expect(parseThreadRef("https://example.com/%E6%97%A5本").path).toBe("/日本");
  });

  it("rejects a truncated percent-escape", () => {
    expect(() => parseThreadRef("https://example.com/a%4")).toThrow(InvalidUrlError);
  });

  it("rejects a non-numeric port", () => {
    expect(() => parseThreadRef("https://example.com:abc/p")).toThrow(InvalidUrlError);
  });

  it("rejects characters outside the host grammar", () => {
    expect(() => parseThreadRef("https://exa<mple.com/p")).toThrow(InvalidUrlError);
  });

  it("rejects an unclosed IP literal", () => {
    expect(() => parseThreadRef("https://[::1/p")).toThrow(InvalidUrlError);
  });

  it("accepts a bracketed IP literal with a port", () => {
    expect(parseThreadRef("http://[::1]:8080/p")).toEqual({ host: "[::1]:8080", path: "/p" });
  });

  it("accepts a non-ASCII host", () => {
    expect(parseThreadRef("https://bücher.example/p").host).toBe("bücher.example");
  });

  it("rejects an invalid scheme", () => {
    expect(() => parseThreadRef("1http://example.com/")).toThrow(InvalidUrlError);
  });

  it("reports failures as 400 input errors", () => {
    try {
      parseThreadRef("/nohost");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect((err as InvalidInputError).statusCode).toBe(400);
      expect((err as InvalidInputError).message).toBe("bad url value: missing host");
    }
  });
});

describe("formatThreadRef", () => {
  it("joins host and path", () => {
    expect(formatThreadRef({ host: "example.com", path: "/post" })).toBe("example.com/post");
  });
});
