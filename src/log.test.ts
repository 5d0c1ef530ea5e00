import { describe, expect, it } from "vitest";
import { formatLine } from "./log";

describe("formatLine", () => {
  it("joins level, event and fields", () => {
    expect(formatLine("info", "fetch_ok", { status: 200, ok: true })).toBe("[info] fetch_ok status=200 ok=true");
  });

  it("drops undefined fields and keeps null", () => {
    expect(formatLine("error", "config_error", { line: undefined, key: null })).toBe("[error] config_error key=null");
  });

  it("quotes values with spaces, quotes or =", () => {
    expect(formatLine("warn", "x", { message: 'bad "value"', q: "a=b", empty: "" })).toBe(
      '[warn] x message="bad \\"value\\"" q="a=b" empty=""'
    );
  });
});
