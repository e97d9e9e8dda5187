import type { ZodError } from "zod";

/**
 * Raised before any output is produced: missing or mistyped record fields,
 * unknown kind/priority, non-positive price.
 */
export class SignalInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "SignalInputError";
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): SignalInputError {
    const issues = error.issues.map(issue => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new SignalInputError(message, issues);
  }
}

/**
 * Raised when a rendered page cannot be written to its destination.
 */
export class SignalOutputError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write signal page ${filePath}: ${reason}`, { cause });
    this.name = "SignalOutputError";
    this.filePath = filePath;
  }
}
