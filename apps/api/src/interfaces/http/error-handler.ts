import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AiError } from '../../domain/ai/schemas';
import type { ErrorResponse } from './schemas/analyze.schemas';

/**
 * Every failure leaves as `{ error: message }`. Client errors keep their own
 * status code; everything else is a 500 with the message exposed.
 */
export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
    if (error instanceof AiError) {
        request.log.error({ err: error, code: error.code }, 'Vision model request failed');
    } else {
        request.log.error(error);
    }

    const status = error.statusCode && error.statusCode >= 400 && error.statusCode < 500
        ? error.statusCode
        : 500;

    const body: ErrorResponse = { error: error.message };
    return reply.code(status).send(body);
}
