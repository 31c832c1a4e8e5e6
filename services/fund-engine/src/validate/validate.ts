import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { join } from "path";

import { getConfig } from "../config.js";
import type { FundEngineRequestV1 } from "../runtime/types.js";

export const CONTRACT_SCHEMA_FILE = "fund_engine_v1.schema.json";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

type AjvError = { instancePath?: string; message?: string };

type AjvValidateFunction<T> = ((data: unknown) => data is T) & {
  errors?: AjvError[] | null;
};

type AjvValidator = {
  compile: <T>(schema: unknown) => AjvValidateFunction<T>;
};

let validator: AjvValidateFunction<FundEngineRequestV1> | null = null;

function getValidator(): AjvValidateFunction<FundEngineRequestV1> {
  if (validator) {
    return validator;
  }

  const schemaPath = join(getConfig().contractsDir, CONTRACT_SCHEMA_FILE);
  const schema: unknown = JSON.parse(readFileSync(schemaPath, "utf8"));

  const AjvConstructor = Ajv2020 as unknown as new (opts: Record<string, unknown>) => AjvValidator;
  const ajv = new AjvConstructor({ strict: true, allErrors: true });
  const addFormatsPlugin = addFormats as unknown as (instance: AjvValidator) => void;
  addFormatsPlugin(ajv);

  validator = ajv.compile<FundEngineRequestV1>(schema);
  return validator;
}

function formatErrors(errors: readonly AjvError[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
    const message = error.message ?? "invalid";
    return `${path}: ${message}`;
  });
}

export type ParsedRequest =
  | { valid: true; errors: string[]; request: FundEngineRequestV1 }
  | { valid: false; errors: string[]; request: null };

export function parseRequest(request: unknown): ParsedRequest {
  try {
    const validate = getValidator();
    if (validate(request)) {
      return { valid: true, errors: [], request };
    }
    return { valid: false, errors: formatErrors(validate.errors), request: null };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
      request: null,
    };
  }
}

export function validateRequest(request: unknown): ValidationResult {
  const { valid, errors } = parseRequest(request);
  return { valid, errors };
}
