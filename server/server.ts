import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { GatewayError, PlanningError, StoreError, errorMessage, isAgentError, type AnyAgentError } from '../core/contracts/errors';
import { buildContainer, type BuildContainerOptions, type ContainerContext } from './container';

const goalBodySchema = z.object({
  goal: z.string().trim().min(1, 'goal must be a non-empty string').max(2000)
});

const tickBodySchema = z.object({
  day: z.number().int().nonnegative().optional()
});

export interface BuildServerOptions {
  logger?: boolean;
  /** Options for the container built by the server. Ignored when `context` is given. */
  container?: BuildContainerOptions;
  /** A prebuilt container; the server still cleans it up on close. */
  context?: ContainerContext;
}

export interface HttpError {
  statusCode: number;
  body: { error: string; code?: string };
}

/** Maps the core error taxonomy onto HTTP status codes. */
export function toHttpError(error: unknown): HttpError {
  if (isAgentError(error)) {
    return { statusCode: statusFor(error), body: { error: error.message, code: error.code } };
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return { statusCode, body: { error: errorMessage(error) } };
  }
  return { statusCode: 500, body: { error: 'Internal server error' } };
}

function statusFor(error: AnyAgentError): number {
  if (error instanceof GatewayError) {
    return error.kind === 'transient' ? 503 : 502;
  }
  if (error instanceof PlanningError) {
    if (error.kind === 'invalid_goal') {
      return 400;
    }
    if (error.cause instanceof GatewayError && error.cause.kind === 'transient') {
      return 503;
    }
    return 502;
  }
  if (error instanceof StoreError) {
    switch (error.kind) {
      case 'not_found':
        return 404;
      case 'conflict':
        return 409;
      default:
        return 500;
    }
  }
  // AdvanceError: goal_conflict or invalid_state
  return 409;
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? true });
  const containerContext = options.context ?? (await buildContainer(options.container));
  const { agent } = containerContext;

  // Register cleanup on server close
  fastify.addHook('onClose', async () => {
    await containerContext.cleanup();
  });

  fastify.setErrorHandler((error, request, reply) => {
    const { statusCode, body } = toHttpError(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    }
    reply.code(statusCode).send(body);
  });

  fastify.get('/health', async () => ({ status: 'ok' }));

  fastify.get('/ready', async (_request, reply) => {
    const readiness = await agent.readiness();
    if (!readiness.ready) {
      reply.code(503).send({ status: 'not_ready', reason: readiness.reason ?? 'Agent is not ready' });
      return;
    }
    reply.code(200).send({ status: 'ready', agentStatus: readiness.status });
  });

  fastify.get('/agent/status', async () => ({ status: await agent.status() }));

  fastify.get('/agent/state', async (_request, reply) => {
    const record = await agent.snapshot();
    if (!record) {
      reply.code(404).send({ error: 'No agent state found; set a goal first', code: 'StoreError:not_found' });
      return;
    }
    reply.code(200).send(record);
  });

  fastify.post('/agent/goal', async (request, reply) => {
    const parsed = goalBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400).send({ error: parsed.error.issues.map((issue) => issue.message).join('; ') });
      return;
    }

    const state = await agent.runOnce(parsed.data.goal, { requestId: request.id });
    reply.code(200).send(state);
  });

  fastify.post('/agent/tick', async (request, reply) => {
    const parsed = tickBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400).send({ error: parsed.error.issues.map((issue) => issue.message).join('; ') });
      return;
    }

    const state = await agent.tick({ day: parsed.data.day, requestId: request.id });
    reply.code(200).send(state);
  });

  return fastify;
}

/** Plans `USER_GOAL` when the store holds no record yet. */
export async function seedGoal(context: ContainerContext): Promise<void> {
  const goal = context.config.userGoal;
  if (!goal || (await context.store.load())) {
    return;
  }
  console.log(`[INFO] Planning goal from USER_GOAL: ${goal}`);
  await context.agent.runOnce(goal, { requestId: 'startup' });
}

if (require.main === module) {
  buildContainer()
    .then(async (context) => {
      const { port, host } = context.config;
      const fastify = await buildServer({ context });

      try {
        await seedGoal(context);
        await fastify.listen({ port, host });
        console.log(`Server listening on ${host}:${port}`);
      } catch (error) {
        console.error(`[ERROR] Failed to start server on port ${port}:`, error);
        await fastify.close();
        process.exit(1);
      }

      if (context.scheduler) {
        context.scheduler.start();
        console.log(`[INFO] Daily scheduler started (every ${context.config.scheduler.checkIntervalMs}ms)`);
      }
    })
    .catch((error: unknown) => {
      console.error('[ERROR] Failed to build server:', error);
      process.exit(1);
    });
}
