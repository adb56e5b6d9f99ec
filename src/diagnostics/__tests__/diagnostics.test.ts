import { describe, expect, it } from "vitest";
import {
  DiagnosticError,
  diagnosticFromCode,
  formatDiagnostic,
  isDiagnosticError,
  raise,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with the registry phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "RF0002",
      params: { kind: "ambiguous-member", owner: "Lookup", name: "item", candidates: 2 },
      subject: "Lookup",
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "Lookup ERROR [reflection] RF0002: Lookup.item matches 2 candidates; the signature must select exactly one"
    );
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "PL0001",
      params: { kind: "dynamic-code-forbidden", mode: "fast" },
    });
    expect(diagnostic.phase).toBe("platform");
    expect(diagnostic.hints?.[0]?.message).toContain("expression builder");
  });

  it("raises diagnostic errors that keep their cause", () => {
    const cause = new Error("EACCES");
    let caught: unknown;
    try {
      raise({
        code: "IO0001",
        params: { kind: "persist-failed", path: "/tmp/out.js", reason: "permission denied" },
        cause,
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DiagnosticError);
    expect(isDiagnosticError(caught, "IO0001")).toBe(true);
    expect(isDiagnosticError(caught, "CG0001")).toBe(false);
    expect(caught instanceof Error ? caught.cause : undefined).toBe(cause);
  });
});
