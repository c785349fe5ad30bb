import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, SchemaObject } from "ajv";

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  validateFormats: false,
});

function describe(errors: ErrorObject[] | null | undefined) {
  return (errors ?? [])
    .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
    .join("; ");
}

/** Definitions that fail are skipped by the caller, never thrown. */
export function validateAgainst<T>(
  schema: SchemaObject,
  data: unknown,
): { valid: true; value: T } | { valid: false; reason: string } {
  const validate = ajv.compile<T>(schema);
  if (validate(data)) return { valid: true, value: data };
  return { valid: false, reason: describe(validate.errors) };
}
