import type { z } from "zod";

/** One `path: message` line per zod issue */
export function zodIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
  );
}
