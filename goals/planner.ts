import { GatewayError, PlanningError } from '../core/contracts/errors';
import type { CompletionGateway } from '../llm/model-gateway';
import { DEFAULT_MAX_DAYS, parsePlanResponse } from './plan-parser';
import type { Goal, Plan } from './types';

export interface Planner {
  plan(goal: Goal): Promise<Plan>;
}

export interface LlmPlannerOptions {
  maxDays?: number;
}

export class LlmPlanner implements Planner {
  private readonly maxDays: number;

  constructor(
    private readonly gateway: CompletionGateway,
    options: LlmPlannerOptions = {}
  ) {
    const maxDays = options.maxDays ?? DEFAULT_MAX_DAYS;
    if (!Number.isInteger(maxDays) || maxDays < 1) {
      throw new Error(`maxDays must be a positive integer. Got: ${options.maxDays}`);
    }
    this.maxDays = maxDays;
  }

  async plan(goal: Goal): Promise<Plan> {
    const text = goal.text.trim();
    if (!text) {
      throw new PlanningError('invalid_goal', 'Goal text is required');
    }

    let response: string;
    try {
      response = await this.gateway.complete(buildPlanningPrompt(text, this.maxDays));
    } catch (error) {
      if (error instanceof GatewayError) {
        throw new PlanningError('gateway_failure', `Planning call failed: ${error.message}`, error);
      }
      throw error;
    }

    return parsePlanResponse(response, this.maxDays);
  }
}

export function buildPlanningPrompt(goalText: string, maxDays: number): string {
  return [
    'You are an AI task analyst and planner.',
    `The user's goal is: "${goalText}".`,
    `Estimate how many days are realistically needed to accomplish it with one focused task per day (a whole number between 1 and ${maxDays}).`,
    'Then break the goal into exactly one concrete subtask per day, in the order they should be done.',
    'Respond ONLY with JSON of the form:',
    '{"estimatedDays": <number>, "subtasks": ["<day 1 subtask>", "<day 2 subtask>"]}'
  ].join('\n');
}
