import type { ValidationIssue } from "@fanout/errors";
import { type ZodError, z } from "zod";

/** Schema for a value that must be callable */
export function functionSchema<T>(name: string) {
  return z.custom<T>((value) => typeof value === "function", {
    message: `${name} must be a function`,
  });
}

/** Convert zod issues into the error package's field-level issues */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((i) => ({
    field: i.path.join(".") || "config",
    message: i.message,
    code: i.code,
  }));
}

/** One-line summary of zod issues, joined with "; " */
export function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((i) => `${i.field}: ${i.message}`).join("; ");
}
