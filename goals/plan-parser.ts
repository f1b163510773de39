import { z } from 'zod';
import { PlanningError } from '../core/contracts/errors';
import { ZodOutputValidator } from '../security/output-validator';
import type { Plan } from './types';

export const DEFAULT_MAX_DAYS = 10;

function planResponseSchema(maxDays: number) {
  return z.object({
    estimatedDays: z
      .union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a whole number').transform(Number)])
      .pipe(z.number().int().min(1).max(maxDays)),
    subtasks: z
      .array(
        z.union([
          z.string(),
          z.object({ description: z.string() }).transform((subtask) => subtask.description)
        ])
      )
      .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0))
      .pipe(z.array(z.string()).min(1, 'at least one subtask is required'))
  });
}

const DAYS_LINE = /^\s*(?:estimated\s+)?(?:days?|duration)\s*[:=]\s*(\d+)\s*(?:days?)?\s*$/i;
const SUBTASK_LINE = /^\s*(?:(?:day\s*)?\d+\s*[.):-]|[-*•])\s+(.+?)\s*$/i;

/**
 * Turns a planning reply into a Plan. JSON is preferred; a `Days: n` line followed by
 * numbered or bulleted subtasks is accepted as a fallback. Nothing is defaulted: a reply
 * that yields no valid day count or no subtask is rejected.
 */
export function parsePlanResponse(text: string, maxDays: number = DEFAULT_MAX_DAYS): Plan {
  const validator = new ZodOutputValidator(planResponseSchema(maxDays));
  const result = validator.validate(text);
  if (result.success) {
    return toPlan(result.data.estimatedDays, result.data.subtasks);
  }

  const fromLines = parseLineFormat(text, maxDays);
  if (fromLines) {
    return fromLines;
  }

  throw new PlanningError(
    'unparsable_response',
    `Model response is not a valid plan: ${result.errors.join('; ')}`
  );
}

function parseLineFormat(text: string, maxDays: number): Plan | null {
  let estimatedDays: number | null = null;
  const subtasks: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const days = line.match(DAYS_LINE);
    if (days?.[1] !== undefined && estimatedDays === null) {
      estimatedDays = Number(days[1]);
      continue;
    }
    const subtask = line.match(SUBTASK_LINE);
    if (subtask?.[1] !== undefined && estimatedDays !== null) {
      subtasks.push(subtask[1]);
    }
  }

  if (estimatedDays === null || estimatedDays < 1 || estimatedDays > maxDays || subtasks.length === 0) {
    return null;
  }

  return toPlan(estimatedDays, subtasks);
}

function toPlan(estimatedDays: number, descriptions: string[]): Plan {
  return {
    estimatedDays,
    subtasks: descriptions.map((description, index) => ({
      id: index + 1,
      description,
      status: 'pending'
    }))
  };
}
