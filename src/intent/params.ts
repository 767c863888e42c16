import { z } from "zod";
import type { ParamSchema, ParamValue } from "../types/intent.js";

export const paramValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.record(paramValueSchema)])
);

const TRUE_WORDS = new Set(["true", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0"]);

/**
 * zod schema for one declared parameter. Classifier output is loosely typed,
 * so scalar values are coerced toward the declared type before checking.
 */
export function schemaForParam(param: ParamSchema): z.ZodType<ParamValue, z.ZodTypeDef, unknown> {
  switch (param.type) {
    case "string": {
      const allowed = param.enum;
      const base = z.preprocess(
        v => (typeof v === "number" || typeof v === "boolean" ? String(v) : typeof v === "string" ? v.trim() : v),
        z.string().min(1, "must not be empty")
      );
      if (!allowed?.length) return base;
      return base.transform((v, ctx) => {
        const hit = allowed.find(a => a.toLowerCase() === v.toLowerCase());
        if (hit === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be one of: ${allowed.join(", ")}` });
          return z.NEVER;
        }
        return hit;
      });
    }
    case "number":
      return z.preprocess(
        v => (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v)) ? Number(v) : v),
        z.number({ invalid_type_error: "must be a number" }).finite()
      );
    case "boolean":
      return z.preprocess(v => {
        if (typeof v !== "string") return v;
        const word = v.trim().toLowerCase();
        if (TRUE_WORDS.has(word)) return true;
        if (FALSE_WORDS.has(word)) return false;
        return v;
      }, z.boolean({ invalid_type_error: "must be true or false" }));
    case "object":
      return z.record(paramValueSchema, { invalid_type_error: "must be an object" });
  }
}
