import { GatewayError, PlanningError } from '../../core/contracts/errors';
import { LlmPlanner, buildPlanningPrompt } from '../../goals/planner';
import { ScriptedGateway, captureError } from '../support/fixtures';

const goal = { text: 'Build a workout planner', createdAt: 0 };

describe('LlmPlanner', () => {
  it('asks the model for a bounded plan and parses the reply', async () => {
    const gateway = new ScriptedGateway(['{"estimatedDays": 2, "subtasks": ["Design", "Build"]}']);
    const planner = new LlmPlanner(gateway, { maxDays: 5 });

    const plan = await planner.plan(goal);

    expect(plan.estimatedDays).toBe(2);
    expect(plan.subtasks).toHaveLength(2);
    expect(gateway.prompts).toEqual([buildPlanningPrompt('Build a workout planner', 5)]);
    expect(gateway.prompts[0]).toContain('a whole number between 1 and 5');
  });

  it('rejects a blank goal without calling the model', async () => {
    const gateway = new ScriptedGateway();
    const planner = new LlmPlanner(gateway);

    const error = await captureError(() => planner.plan({ text: '   ', createdAt: 0 }));

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ kind: 'invalid_goal' });
    expect(gateway.prompts).toHaveLength(0);
  });

  it('wraps gateway failures', async () => {
    const cause = new GatewayError('transient', 'OpenAI API error: 503', { attempts: 4 });
    const planner = new LlmPlanner(new ScriptedGateway([cause]));

    const error = await captureError(() => planner.plan(goal));

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ kind: 'gateway_failure', message: 'Planning call failed: OpenAI API error: 503' });
    expect(error instanceof Error && error.cause).toBe(cause);
  });

  it('reports an unparsable reply', async () => {
    const planner = new LlmPlanner(new ScriptedGateway(['Sounds fun!']));

    await expect(planner.plan(goal)).rejects.toMatchObject({ kind: 'unparsable_response' });
  });

  it('passes through unexpected errors', async () => {
    const boom = new Error('boom');
    const planner = new LlmPlanner(new ScriptedGateway([boom]));

    await expect(planner.plan(goal)).rejects.toBe(boom);
  });

  it('validates maxDays', () => {
    expect(() => new LlmPlanner(new ScriptedGateway(), { maxDays: 0 })).toThrow(
      'maxDays must be a positive integer. Got: 0'
    );
  });
});
