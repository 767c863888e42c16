import type { FieldError } from "../errors.js";
import type { CapabilityDescriptor, Intent, Parameters } from "../types/intent.js";
import { schemaForParam } from "./params.js";

export type ValidationMode = "strict" | "lenient";

export type ValidationResult =
  | { ok: true; intent: Intent }
  | { ok: false; errors: FieldError[] };

/**
 * Checks an intent against its module's descriptor and returns the intent
 * with normalized parameters, or every field-level problem found.
 * Unknown parameters fail in strict mode and are dropped in lenient mode.
 */
export function validateIntent(
  intent: Intent,
  descriptor: CapabilityDescriptor | undefined,
  mode: ValidationMode = "strict"
): ValidationResult {
  if (!descriptor || descriptor.name !== intent.module) {
    return fail({ field: "module", code: "unknown_module", message: `unknown module '${intent.module}'`, recoverable: false });
  }
  const action = Object.hasOwn(descriptor.actions, intent.action) ? descriptor.actions[intent.action] : undefined;
  if (!action) {
    return fail({
      field: "action",
      code: "unknown_action",
      message: `module '${intent.module}' has no action '${intent.action}'`,
      recoverable: false,
    });
  }

  const errors: FieldError[] = [];
  const normalized: Parameters = {};

  for (const [name, param] of Object.entries(action.parameters)) {
    const raw = intent.parameters[name];
    if (raw === undefined || raw === "") {
      if (param.required) {
        errors.push({ field: name, code: "missing", message: `missing required parameter '${name}'`, recoverable: true });
      }
      continue;
    }
    const parsed = schemaForParam(param).safeParse(raw);
    if (parsed.success) {
      normalized[name] = parsed.data;
    } else {
      const why = parsed.error.issues.map(i => i.message).join(", ");
      errors.push({ field: name, code: "malformed", message: `parameter '${name}' ${why}`, recoverable: true });
    }
  }

  if (mode === "strict") {
    for (const name of Object.keys(intent.parameters)) {
      if (!Object.hasOwn(action.parameters, name)) {
        errors.push({
          field: name,
          code: "unknown_parameter",
          message: `'${intent.module}.${intent.action}' takes no parameter '${name}'`,
          recoverable: false,
        });
      }
    }
  }

  if (errors.length) return { ok: false, errors };
  return { ok: true, intent: freezeIntent({ ...intent, parameters: normalized }) };
}

export function freezeIntent(intent: Intent): Intent {
  return Object.freeze({ ...intent, parameters: Object.freeze({ ...intent.parameters }) });
}

function fail(error: FieldError): ValidationResult {
  return { ok: false, errors: [error] };
}
