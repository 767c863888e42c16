import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { JsonValue } from "../types/intent.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/**
 * What JSON keeps of a value: functions and undefined members are dropped,
 * dates become strings. Values JSON cannot encode (cycles, bigints) become a
 * note naming the failure.
 */
export function toJsonValue(value: unknown): JsonValue {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    return `[unserializable output: ${errorMessage(err)}]`;
  }
  if (text === undefined) return null;
  return jsonValueSchema.parse(JSON.parse(text));
}
