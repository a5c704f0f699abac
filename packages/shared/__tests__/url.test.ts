import { describe, it, expect } from "@jest/globals";
import { sanitizeUrl, validateUrl, validateCustomAlias } from "../src/index.js";

describe("validateUrl", () => {
  it("accepts ordinary web and ftp URLs", () => {
    expect(validateUrl("https://example.com")).toEqual({ valid: true });
    expect(validateUrl("http://example.com/path?q=1")).toEqual({ valid: true });
    expect(validateUrl("ftp://files.example.com/a.txt")).toEqual({ valid: true });
  });

  it("enforces length bounds", () => {
    expect(validateUrl("")).toEqual({ valid: false, error: "URL cannot be empty" });
    expect(validateUrl("http://a")).toEqual({ valid: false, error: "URL too short (minimum 10 characters)" });
    expect(validateUrl(`https://example.com/${"a".repeat(2048)}`)).toEqual({
      valid: false,
      error: "URL too long (maximum 2048 characters)",
    });
  });

  it("rejects script and data content anywhere in the URL", () => {
    expect(validateUrl("javascript:alert(1)").error).toBe("URL contains potentially malicious content");
    expect(validateUrl("https://example.com/?next=data:text/html").valid).toBe(false);
  });

  it("rejects other schemes", () => {
    expect(validateUrl("mailto:someone@example.com")).toEqual({
      valid: false,
      error: "Unsupported URL scheme: mailto",
    });
  });

  it("rejects malformed input", () => {
    expect(validateUrl("not a url at all")).toEqual({ valid: false, error: "Invalid URL format" });
  });

  it("rejects localhost and private networks", () => {
    expect(validateUrl("http://localhost:3000/x").error).toBe("localhost URLs are not allowed");
    expect(validateUrl("http://127.0.0.1/admin").error).toBe("localhost URLs are not allowed");
    expect(validateUrl("http://10.0.0.8/internal").error).toBe("private IP addresses are not allowed");
    expect(validateUrl("http://192.168.1.1/router").error).toBe("private IP addresses are not allowed");
    expect(validateUrl("http://172.20.0.1/x").error).toBe("private IP addresses are not allowed");
    expect(validateUrl("http://172.32.0.1/x")).toEqual({ valid: true });
  });
});

describe("sanitizeUrl", () => {
  it("trims and defaults to https", () => {
    expect(sanitizeUrl("  example.com/a ")).toBe("https://example.com/a");
    expect(sanitizeUrl("http://example.com")).toBe("http://example.com");
  });
});

describe("validateCustomAlias", () => {
  it("accepts letters, digits, hyphens and underscores", () => {
    expect(validateCustomAlias("my_link-01")).toEqual({ valid: true });
  });

  it("enforces length", () => {
    expect(validateCustomAlias("ab").error).toBe("Custom alias too short (minimum 3 characters)");
    expect(validateCustomAlias("a".repeat(51)).error).toBe("Custom alias too long (maximum 50 characters)");
  });

  it("rejects other characters", () => {
    expect(validateCustomAlias("my.link").valid).toBe(false);
  });

  it("rejects reserved words regardless of case", () => {
    expect(validateCustomAlias("Admin")).toEqual({ valid: false, error: "Custom alias 'Admin' is reserved" });
    expect(validateCustomAlias("metrics").valid).toBe(false);
  });
});
