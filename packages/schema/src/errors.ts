import type { ZodError } from "zod";

/** A config failed validation. One entry per problem, formatted `"<path>: <message>"`. */
export class ConfigParseError extends Error {
  readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super(`Invalid ${subject}: ${issues.join("; ")}`);
    this.name = "ConfigParseError";
    this.issues = issues;
  }

  static fromZodError(subject: string, error: ZodError): ConfigParseError {
    return new ConfigParseError(subject, error.issues.map(formatIssue));
  }
}

function formatIssue(issue: ZodError["issues"][number]): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}
