import type { z } from "zod";
import { GatewayError } from "./errors.js";

/**
 * Parses request input, turning the first zod issue into an InvalidRequest.
 * All issues are listed under `details.issues` as `path: message`.
 */
export function parseInput<S extends z.ZodType>(
  schema: S,
  value: unknown,
  what = "request",
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map(
    (issue) => `${issue.path.map(String).join(".") || what}: ${issue.message}`,
  );
  throw new GatewayError(
    "InvalidRequest",
    parsed.error.issues[0]?.message ?? `Invalid ${what}`,
    { details: { issues } },
  );
}
