/**
 * Compile-CAR Engine — Output Classification Tests
 */

import { describe, it, expect } from "vitest";
import {
  classifyInvocation,
  formatDiagnostic,
  formatFailureReport,
  ALLOWED_DOCUMENT_WARNING,
} from "../src/classifier";
import type { Diagnostic, InvocationResult } from "../src/types";

function cleanResult(overrides: Partial<InvocationResult> = {}): InvocationResult {
  return {
    returnCode: 0,
    stderr: "",
    errors: [],
    documentErrors: [],
    warnings: [],
    documentWarnings: [],
    notices: [],
    documentNotices: [],
    compilationResults: { outputFiles: [] },
    ...overrides,
  };
}

const ambiguous: Diagnostic = {
  type: ALLOWED_DOCUMENT_WARNING,
  description: "The app icon set \"AppIcon\" has an unassigned child.",
};
const missingFile: Diagnostic = {
  type: "Missing Input",
  description: 'The file "icon_512x512@2x.png" could not be found.',
};
const unassigned: Diagnostic = {
  type: "Unassigned Child",
  description: "The image set has an unassigned child.",
};

describe("classifyInvocation", () => {
  it("passes a clean reply", () => {
    expect(classifyInvocation(cleanResult())).toEqual({ passed: true });
  });

  it("fails on a non-zero return code alone", () => {
    const outcome = classifyInvocation(cleanResult({ returnCode: 1, stderr: "boom" }));
    expect(outcome).toEqual({
      passed: false,
      report: { reasons: { "return code": "1" }, stderr: "boom" },
    });
  });

  it.each([
    ["errors", "errors"],
    ["documentErrors", "document errors"],
    ["warnings", "warnings"],
    ["notices", "notices"],
    ["documentNotices", "document notices"],
  ] as const)("fails on any entry in %s", (collection, reason) => {
    const result = cleanResult();
    result[collection] = [unassigned];
    const outcome = classifyInvocation(result);
    expect(outcome).toEqual({
      passed: false,
      report: { reasons: { [reason]: [unassigned] }, stderr: "" },
    });
  });

  it("does not tolerate the allow-listed type as a top-level warning", () => {
    const outcome = classifyInvocation(cleanResult({ warnings: [ambiguous] }));
    expect(outcome.passed).toBe(false);
  });

  it("tolerates ambiguous-content document warnings", () => {
    const outcome = classifyInvocation(
      cleanResult({ documentWarnings: [ambiguous, ambiguous] }),
    );
    expect(outcome).toEqual({ passed: true });
  });

  it("fails on any other single document warning", () => {
    const outcome = classifyInvocation(cleanResult({ documentWarnings: [unassigned] }));
    expect(outcome).toEqual({
      passed: false,
      report: { reasons: { "document warnings": [unassigned] }, stderr: "" },
    });
  });

  it("fails on a document warning without a type", () => {
    const untyped: Diagnostic = { description: "Something odd." };
    const outcome = classifyInvocation(cleanResult({ documentWarnings: [untyped] }));
    expect(outcome.passed).toBe(false);
  });

  it("reports only the non-allow-listed document warnings", () => {
    const outcome = classifyInvocation(
      cleanResult({ documentWarnings: [ambiguous, unassigned, ambiguous] }),
    );
    expect(outcome).toEqual({
      passed: false,
      report: { reasons: { "document warnings": [unassigned] }, stderr: "" },
    });
  });

  it("fails on a notice even with return code 0", () => {
    const outcome = classifyInvocation(cleanResult({ notices: [missingFile] }));
    expect(outcome).toEqual({
      passed: false,
      report: { reasons: { notices: [missingFile] }, stderr: "" },
    });
  });

  it("collects every reason, not just the first", () => {
    const outcome = classifyInvocation(
      cleanResult({
        returnCode: 1,
        stderr: "actool[123] crashed",
        errors: [unassigned],
        documentWarnings: [ambiguous, unassigned],
        documentNotices: [missingFile],
      }),
    );
    expect(outcome).toEqual({
      passed: false,
      report: {
        reasons: {
          "return code": "1",
          errors: [unassigned],
          "document warnings": [unassigned],
          "document notices": [missingFile],
        },
        stderr: "actool[123] crashed",
      },
    });
  });

  it("is deterministic across repeated calls", () => {
    const input = cleanResult({ warnings: [unassigned], notices: [missingFile] });
    expect(classifyInvocation(input)).toEqual(classifyInvocation(input));
  });

  it("does not depend on the order collections are filled in", () => {
    const a = cleanResult({ notices: [missingFile], errors: [unassigned] });
    const b = cleanResult({ errors: [unassigned], notices: [missingFile] });
    expect(classifyInvocation(a)).toEqual(classifyInvocation(b));
  });

  it("ignores stderr when nothing failed", () => {
    const outcome = classifyInvocation(cleanResult({ stderr: "usual spew" }));
    expect(outcome).toEqual({ passed: true });
  });

  it("does not modify its input", () => {
    const input = cleanResult({ documentWarnings: [ambiguous, unassigned] });
    classifyInvocation(input);
    expect(input.documentWarnings).toEqual([ambiguous, unassigned]);
  });
});

describe("formatDiagnostic", () => {
  it("shows type and description", () => {
    expect(formatDiagnostic(missingFile)).toBe(
      '[Missing Input] The file "icon_512x512@2x.png" could not be found.',
    );
  });

  it("appends the failure reason", () => {
    expect(
      formatDiagnostic({ description: "Failed to read.", "failure-reason": "Permission denied" }),
    ).toBe("Failed to read. (Permission denied)");
  });

  it("falls back to JSON for unrecognized entries", () => {
    expect(formatDiagnostic({ code: "42" })).toBe('{"code":"42"}');
  });
});

describe("formatFailureReport", () => {
  it("lists every reason and the stderr", () => {
    const message = formatFailureReport({
      reasons: { "return code": "1", notices: [missingFile] },
      stderr: "  actool crashed\n",
    });
    expect(message).toBe(
      [
        "actool failed:",
        "  return code: 1",
        "  notices:",
        '    - [Missing Input] The file "icon_512x512@2x.png" could not be found.',
        "  stderr: actool crashed",
      ].join("\n"),
    );
  });

  it("omits an empty stderr", () => {
    expect(formatFailureReport({ reasons: { "return code": "2" }, stderr: "" })).toBe(
      "actool failed:\n  return code: 2",
    );
  });
});
