import Ajv, { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import runSummarySchema from "../../contracts/schemas/run_summary.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

export const RUN_SUMMARY_SCHEMA: SchemaObject = runSummarySchema;

/** Compiled validators are cached by ajv per schema object. */
export function getSchemaValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function assertValidSchema<T>(
  validator: ValidateFunction<T>,
  data: unknown,
  label: string
): asserts data is T {
  const valid = validator(data);
  if (valid) return;
  const errors = (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`)
    .join("; ");
  throw new Error(`${label} failed schema validation: ${errors}`);
}
