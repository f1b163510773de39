import type { ZodType, ZodTypeDef } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

/**
 * Finds the JSON object inside typical model replies:
 * - a fenced code block (```json ... ``` or ``` ... ```)
 * - otherwise the first balanced { ... } in the text
 */
export function extractJsonObject(text: string): string | null {
  const trimmed = text.trim();
  const codeBlock = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (codeBlock?.[1] !== undefined) {
    return codeBlock[1].trim();
  }

  const braceStart = trimmed.indexOf('{');
  if (braceStart < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  for (let i = braceStart; i < trimmed.length; i += 1) {
    const c = trimmed[i];
    if (inString) {
      if (c === '\\') {
        i += 1;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === '"') inString = true;
    else if (c === '{') depth += 1;
    else if (c === '}') {
      depth -= 1;
      if (depth === 0) return trimmed.slice(braceStart, i + 1);
    }
  }
  return null;
}

/**
 * Validates untrusted model output against a zod schema. Accepts bare JSON,
 * double-encoded JSON, fenced blocks and objects embedded in prose.
 */
export class ZodOutputValidator<T> {
  constructor(
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
    private readonly maxOutputLength: number = 64 * 1024
  ) {}

  validate(output: string): ValidationResult<T> {
    if (output.length > this.maxOutputLength) {
      return { success: false, errors: [`Output exceeds maximum length of ${this.maxOutputLength} characters`] };
    }

    const parsed = parseLoose(output);
    if (parsed === undefined) {
      return { success: false, errors: ['Invalid JSON output'] };
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      return {
        success: false,
        errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      };
    }

    return { success: true, data: result.data };
  }
}

function parseLoose(output: string): unknown {
  let parsed = tryParse(output);
  if (parsed === undefined) {
    const extracted = extractJsonObject(output);
    parsed = extracted === null ? undefined : tryParse(extracted);
  }

  // Model returned a JSON string that itself holds the object
  if (typeof parsed === 'string') {
    const extracted = extractJsonObject(parsed);
    return extracted === null ? undefined : tryParse(extracted);
  }

  return parsed;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}
