import Ajv, { SchemaObject, ValidateFunction } from "ajv";

const ajv = new Ajv({ allErrors: true, strict: false });

export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatSchemaErrors(validator: ValidateFunction): string {
  return (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
}
