import type { FastifyPluginAsync, FastifyReply } from 'fastify';

import { z } from 'zod';

import { fail, type Outcome, succeed } from '../../core/outcome.js';
import { verifySignature } from '../../core/signature.js';
import { sendFailure } from '../../lib/http-errors.js';
import type { DeploymentPipeline } from '../../pipeline/deployment-pipeline.js';
import { buildDeployResponse } from '../../pipeline/response-builder.js';

export const SIGNATURE_HEADER = 'x-signature';

const stackParamsSchema = z.object({
  stack: z.string(),
});

const deployBodySchema = z.object({
  // `0` and `""` count as absent; other numbers are stringified.
  stack: z
    .union([z.string().min(1), z.number().refine((value) => value !== 0)])
    .transform((value) => String(value)),
});

export interface DeployRoutesOptions {
  pipeline: DeploymentPipeline;
  deploySecret: Buffer;
}

const rawBodyOf = (body: unknown): Buffer => (Buffer.isBuffer(body) ? body : Buffer.alloc(0));

const parseStackFromBody = (raw: Buffer): Outcome<string> => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw.length > 0 ? raw.toString('utf8') : '{}');
  } catch {
    return fail('bad_request', 'invalid JSON payload');
  }

  const parsed = deployBodySchema.safeParse(payload);
  if (!parsed.success) {
    return fail('bad_request', 'stack is required');
  }
  return succeed(parsed.data.stack);
};

export const deployRoutes: FastifyPluginAsync<DeployRoutesOptions> = async (app, options) => {
  const { pipeline, deploySecret } = options;

  const runDeployment = async (stack: string, reply: FastifyReply) => {
    const outcome = await pipeline.deploy(stack);
    if (!outcome.ok) {
      return sendFailure(reply, outcome.failure);
    }

    const response = buildDeployResponse(outcome.value);
    return reply.code(response.statusCode).send(response.body);
  };

  app.post('/deploy/:stack', async (request, reply) => {
    const { stack } = stackParamsSchema.parse(request.params);
    const body = rawBodyOf(request.body);
    // Callers without a body sign the stack name itself.
    const signed = body.length > 0 ? body : Buffer.from(stack, 'utf8');

    const verified = verifySignature(deploySecret, request.headers[SIGNATURE_HEADER], signed);
    if (!verified.ok) {
      return sendFailure(reply, verified.failure);
    }

    return runDeployment(stack, reply);
  });

  app.post('/deploy', async (request, reply) => {
    const body = rawBodyOf(request.body);

    const verified = verifySignature(deploySecret, request.headers[SIGNATURE_HEADER], body);
    if (!verified.ok) {
      return sendFailure(reply, verified.failure);
    }

    const stack = parseStackFromBody(body);
    if (!stack.ok) {
      return sendFailure(reply, stack.failure);
    }

    return runDeployment(stack.value, reply);
  });
};
