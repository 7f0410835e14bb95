/**
 * Compile-CAR Engine — Output Classification
 *
 * Decides whether an actool reply is clean enough to use. Every reason is
 * collected before deciding, so a failure message lists all of them at once.
 *
 * Fails on:
 *   - a non-zero return code
 *   - any error, warning or notice, top-level or document-level
 *
 * except document warnings of type "Ambiguous Content", which actool emits
 * because the catalog carries hand-made fallback bitmaps next to the .icon.
 *
 * Notices are fatal because actool reports missing input files as notices.
 */

import type {
  Classification,
  Diagnostic,
  FailureReason,
  FailureReport,
  InvocationResult,
} from "./types";

/** The one document-warning type that never fails a compile */
export const ALLOWED_DOCUMENT_WARNING = "Ambiguous Content";

type DiagnosticCollection =
  | "errors"
  | "documentErrors"
  | "warnings"
  | "documentWarnings"
  | "notices"
  | "documentNotices";

interface CollectionCheck {
  reason: FailureReason;
  collection: DiagnosticCollection;
  filter?: (diagnostics: Diagnostic[]) => Diagnostic[];
}

const COLLECTION_CHECKS: readonly CollectionCheck[] = [
  { reason: "errors", collection: "errors" },
  { reason: "document errors", collection: "documentErrors" },
  { reason: "warnings", collection: "warnings" },
  {
    reason: "document warnings",
    collection: "documentWarnings",
    filter: (warnings) =>
      warnings.filter((warning) => warning.type !== ALLOWED_DOCUMENT_WARNING),
  },
  { reason: "notices", collection: "notices" },
  { reason: "document notices", collection: "documentNotices" },
];

/**
 * Classify a parsed actool reply. Pure: the same input always yields the
 * same outcome and the same reasons.
 */
export function classifyInvocation(result: InvocationResult): Classification {
  const reasons: FailureReport["reasons"] = {};

  if (result.returnCode !== 0) {
    reasons["return code"] = String(result.returnCode);
  }

  for (const check of COLLECTION_CHECKS) {
    const all = result[check.collection];
    const remaining = check.filter ? check.filter(all) : all;
    if (remaining.length > 0) {
      reasons[check.reason] = remaining;
    }
  }

  if (Object.keys(reasons).length === 0) {
    return { passed: true };
  }

  return { passed: false, report: { reasons, stderr: result.stderr } };
}

/**
 * One-line rendering of a diagnostic: "[type] description (failure reason)".
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const parts: string[] = [];
  if (diagnostic.type) parts.push(`[${diagnostic.type}]`);
  if (diagnostic.description) parts.push(diagnostic.description);
  if (diagnostic["failure-reason"]) {
    parts.push(`(${diagnostic["failure-reason"]})`);
  }
  return parts.length > 0 ? parts.join(" ") : JSON.stringify(diagnostic);
}

/**
 * Render a failure report as the message of a CompilationError.
 *
 *   actool failed:
 *     return code: 1
 *     notices:
 *       - [Missing Input] The file "icon_16x16.png" could not be found.
 *     stderr: ...
 */
export function formatFailureReport(report: FailureReport): string {
  const lines = ["actool failed:"];

  for (const [reason, detail] of Object.entries(report.reasons)) {
    if (detail === undefined) continue;
    if (typeof detail === "string") {
      lines.push(`  ${reason}: ${detail}`);
    } else {
      lines.push(`  ${reason}:`);
      for (const diagnostic of detail) {
        lines.push(`    - ${formatDiagnostic(diagnostic)}`);
      }
    }
  }

  const stderr = report.stderr?.trim();
  if (stderr) {
    lines.push(`  stderr: ${stderr}`);
  }

  return lines.join("\n");
}
