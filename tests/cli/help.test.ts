import { describe, expect, it } from "vitest";
import { createProgram } from "../../src/cli/program";

describe("cli", () => {
  it("prints help", () => {
    let out = "";
    const program = createProgram()
      .exitOverride()
      .configureOutput({ writeOut: (s) => (out += s) });

    expect(() => program.parse(["node", "qa-match", "--help"])).toThrow();
    expect(out).toContain("qa-match");
    expect(out).toContain("ask");
    expect(out).toContain("import");
  });
});
