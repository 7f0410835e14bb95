/**
 * Compile-CAR Engine — actool Reply Schemas (Zod)
 *
 * actool answers with XML property lists (`--output-format=xml1`). These
 * schemas validate the parsed dictionaries before anything reads them.
 * Collections actool leaves out are treated as empty.
 */

import * as plist from "plist";
import { z } from "zod";

// ─── Keys ────────────────────────────────────────────────────

export const ACTOOL_KEYS = {
  version: "com.apple.actool.version",
  errors: "com.apple.actool.errors",
  documentErrors: "com.apple.actool.document.errors",
  warnings: "com.apple.actool.warnings",
  documentWarnings: "com.apple.actool.document.warnings",
  notices: "com.apple.actool.notices",
  documentNotices: "com.apple.actool.document.notices",
  compilationResults: "com.apple.actool.compilation-results",
} as const;

// ─── Diagnostics ─────────────────────────────────────────────

export const DiagnosticSchema = z
  .object({
    type: z.string().optional(),
    description: z.string().optional(),
    "failure-reason": z.string().optional(),
    "recovery-suggestion": z.string().optional(),
  })
  .passthrough();

const DiagnosticListSchema = z.array(DiagnosticSchema).default([]);

// ─── Replies ─────────────────────────────────────────────────

export const VersionReplySchema = z
  .object({
    [ACTOOL_KEYS.version]: z
      .object({
        "short-bundle-version": z.string(),
        "bundle-version": z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const CompilationReplySchema = z
  .object({
    [ACTOOL_KEYS.errors]: DiagnosticListSchema,
    [ACTOOL_KEYS.documentErrors]: DiagnosticListSchema,
    [ACTOOL_KEYS.warnings]: DiagnosticListSchema,
    [ACTOOL_KEYS.documentWarnings]: DiagnosticListSchema,
    [ACTOOL_KEYS.notices]: DiagnosticListSchema,
    [ACTOOL_KEYS.documentNotices]: DiagnosticListSchema,
    [ACTOOL_KEYS.compilationResults]: z
      .object({
        "output-files": z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type VersionReply = z.infer<typeof VersionReplySchema>;
export type CompilationReply = z.infer<typeof CompilationReplySchema>;

// ─── Parsing ─────────────────────────────────────────────────

/**
 * Decode an XML property list. Throws if the bytes are not one.
 */
export function readPropertyList(bytes: Buffer): unknown {
  const xml = bytes.toString("utf-8");
  if (xml.trim() === "") {
    throw new Error("empty output");
  }
  return plist.parse(xml);
}

/**
 * Flatten zod issues into "path: message" strings for error details.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}
