import type { ErrorEnvelope } from '@stackhook/shared';
import type { FastifyReply } from 'fastify';

import { statusForFailure, type Failure } from '../core/outcome.js';

export const errorBody = (detail: string): ErrorEnvelope => ({ ok: false, detail });

/** The one place a validation failure becomes an HTTP response. */
export const sendFailure = (reply: FastifyReply, failure: Failure) =>
  reply.code(statusForFailure(failure)).send(errorBody(failure.detail));
