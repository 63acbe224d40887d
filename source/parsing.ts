import { ZodIssueCode, z } from "zod";

const parseJsonPreprocessor = (value: unknown, ctx: z.RefinementCtx) => {
  if (typeof value === "string") {
    try {
      return JSON.parse(value);
    } catch (e) {
      ctx.addIssue({
        code: ZodIssueCode.custom,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  return value;
};

/** Wraps a schema so it accepts JSON text as well as parsed values. */
export function jsonParser<T extends z.ZodTypeAny>(input: T) {
  return z.preprocess(parseJsonPreprocessor, input);
}

/** One line per issue: "path.to.field: message". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
