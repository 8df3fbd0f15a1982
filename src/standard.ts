import type { StandardSchemaV1 } from "@standard-schema/spec";

/**
 * Validates a value against a Standard Schema synchronously.
 *
 * @throws When the schema validates asynchronously or rejects the value
 * @internal
 */
export function standardValidate<$$Schema extends StandardSchemaV1>(
  schema: $$Schema,
  input: unknown,
): StandardSchemaV1.InferOutput<$$Schema> {
  const result = schema["~standard"].validate(input);

  if (result instanceof Promise) {
    throw new Error("Promise validation result is not supported");
  }
  if (result.issues) {
    const details = result.issues.map((issue) => issue.message).join("; ");
    throw new Error(`Validation failed: ${details}`);
  }

  return result.value as StandardSchemaV1.InferOutput<$$Schema>;
}
