import * as Ajv2020Module from "ajv/dist/2020.js";
import { readFile } from "node:fs/promises";

export type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

const ajv = new Ajv2020Module.Ajv2020({
  allErrors: true,
  strict: true,
  validateSchema: true,
});

const compiled = new Map<string, Promise<Ajv2020Module.ValidateFunction>>();

async function compileSchemaFile(schemaPath: string): Promise<Ajv2020Module.ValidateFunction> {
  const schema = JSON.parse(await readFile(schemaPath, "utf8")) as object;
  return ajv.compile(schema);
}

// ajv refuses to register the same $id twice, so each schema file is compiled once.
function loadValidator(schemaPath: string): Promise<Ajv2020Module.ValidateFunction> {
  let validator = compiled.get(schemaPath);
  if (!validator) {
    validator = compileSchemaFile(schemaPath);
    compiled.set(schemaPath, validator);
    // a failed read or compile must not stick: the next call retries
    void validator.catch(() => compiled.delete(schemaPath));
  }
  return validator;
}

export async function validateJsonWithSchema<T>(json: Json, schemaPath: string, label: string): Promise<T> {
  const validate = await loadValidator(schemaPath);
  const ok = validate(json);
  if (!ok) {
    const details = ajv.errorsText(validate.errors, { separator: "\n" });
    throw new Error(`Schema validation failed for ${label}:\n${details}`);
  }

  return json as unknown as T;
}

export async function validateJsonFileWithSchema<T>(jsonPath: string, schemaPath: string): Promise<T> {
  const jsonText = await readFile(jsonPath, "utf8");
  return validateJsonWithSchema<T>(JSON.parse(jsonText) as Json, schemaPath, jsonPath);
}
