import { ZodError } from "zod";

/**
 * Turn a thrown value into a one-line diagnostic
 *
 * @example
 * describeError(new Error("boom")) // "boom"
 * describeError(zodError) // "malformed IR: blocks.2.level: Invalid input"
 */
export function describeError(
  error: unknown,
  schemaLabel: string = "malformed IR",
): string {
  if (error instanceof ZodError) {
    const details = error.issues
      .map((issue) => {
        const at = issue.path.map(String).join(".");
        return at ? `${at}: ${issue.message}` : issue.message;
      })
      .join("; ");
    return `${schemaLabel}: ${details}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
