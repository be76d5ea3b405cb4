import { describe, expect, it } from "vitest";
import { ValidationError } from "../core/errors.js";
import {
  SanitizationError,
  escapeForSvg,
  sanitizeChartType,
  sanitizeFilename,
  sanitizeFormat,
  sanitizeNumericRange,
  sanitizeString,
  sanitizeTheme,
} from "../core/security/sanitizer.js";

describe("enum sanitizers", () => {
  it("normalizes case and whitespace", () => {
    expect(sanitizeChartType("  LINE ")).toBe("line");
    expect(sanitizeFormat("SVG")).toBe("svg");
    expect(sanitizeTheme("BizDark")).toBe("bizdark");
  });

  it("rejects unknown values with the input type attached", () => {
    let caught: unknown;
    try {
      sanitizeChartType("pie");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SanitizationError);
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      inputType: "chart type",
      message: "Invalid chart type: pie. Allowed: line, scatter, bar",
    });
  });

  it("rejects non-strings", () => {
    expect(() => sanitizeFormat(42)).toThrow("format must be a string, got number");
  });
});

describe("sanitizeString", () => {
  it("collapses newlines when they are not allowed", () => {
    expect(sanitizeString(" hello\nworld ", { allowNewlines: false })).toBe("hello world");
  });

  it("rejects SQL patterns unless the check is off", () => {
    expect(() => sanitizeString("SELECT * FROM users")).toThrow("Suspicious SQL pattern detected");
    expect(sanitizeString("Update totals", { checkSql: false })).toBe("Update totals");
  });

  it("always rejects script patterns", () => {
    expect(() => sanitizeString("<script>alert(1)</script>", { checkSql: false })).toThrow(
      "Suspicious XSS pattern detected"
    );
    expect(() => sanitizeString("javascript:void(0)", { checkSql: false })).toThrow(SanitizationError);
  });

  it("rejects long input in strict mode and truncates otherwise", () => {
    expect(() => sanitizeString("abcdef", { maxLength: 3 })).toThrow("String too long: 6 > 3");
    expect(sanitizeString("abcdef", { maxLength: 3, strict: false })).toBe("abc");
  });
});

describe("escapeForSvg", () => {
  it("escapes markup characters", () => {
    expect(escapeForSvg(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;"
    );
  });
});

describe("sanitizeNumericRange", () => {
  it("accepts values within bounds", () => {
    expect(sanitizeNumericRange(5, 0, 10)).toBe(5);
  });

  it("rejects out-of-range and non-finite values", () => {
    expect(() => sanitizeNumericRange(11, 0, 10)).toThrow("Value 11 above maximum 10");
    expect(() => sanitizeNumericRange(-1, 0)).toThrow("Value -1 below minimum 0");
    expect(() => sanitizeNumericRange(Number.NaN)).toThrow(SanitizationError);
  });
});

describe("sanitizeFilename", () => {
  it("keeps only the last path segment", () => {
    expect(sanitizeFilename("../etc/passwd")).toEqual({
      filename: "passwd",
      original: "../etc/passwd",
      sanitized: true,
    });
  });

  it("refuses path separators in strict mode", () => {
    const result = sanitizeFilename("a/b.svg", { strict: true, format: "svg" });

    expect(result.reason).toBe("path_separators");
    expect(result.filename).toMatch(/^chart_[0-9a-f-]{36}\.svg$/);
  });

  it("keeps safe names with the right extension untouched", () => {
    expect(sanitizeFilename("sales-2026.svg", { format: "svg" })).toEqual({
      filename: "sales-2026.svg",
      original: "sales-2026.svg",
      sanitized: false,
    });
  });

  it("adds the image extension when the name has none", () => {
    expect(sanitizeFilename("q3 report", { format: "svg" }).filename).toBe("q3_report.svg");
    expect(sanitizeFilename("q3.final", { format: "png" }).filename).toBe("q3.final.png");
  });

  it("replaces another image extension with the served one", () => {
    expect(sanitizeFilename("chart.PNG", { format: "svg" }).filename).toBe("chart.svg");
    expect(sanitizeFilename("photo.jpeg", { format: "jpg" }).filename).toBe("photo.jpeg");
  });

  it("truncates the stem and keeps the extension", () => {
    const result = sanitizeFilename("a".repeat(20), { format: "svg", maxLength: 10 });

    expect(result.filename).toBe("aaaaaa.svg");
  });

  it("generates a name when nothing usable is left", () => {
    expect(sanitizeFilename("", { format: "pdf" })).toMatchObject({ reason: "empty", sanitized: true });
    expect(sanitizeFilename("///").reason).toBe("nothing_left");
    expect(sanitizeFilename("...", { format: "svg" }).filename).toMatch(/^chart_[0-9a-f-]{36}\.svg$/);
  });
});
