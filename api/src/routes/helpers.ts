import type { FastifyRequest } from 'fastify';
import { parseAmount, type CallContext } from '@oracle-bridge/sdk';
import { ValidationError } from '../board/errors.js';

export interface ValueBody {
  value?: string;
  gasPrice?: string;
}

/**
 * Caller identity comes from the X-Caller-Address header
 */
export function callerOf(request: FastifyRequest): string {
  const header = request.headers['x-caller-address'];
  const caller = Array.isArray(header) ? header[0] : header;
  if (!caller) {
    throw new ValidationError('missing_caller', 'X-Caller-Address header is required');
  }
  return caller;
}

export function amount(value: string | undefined, field: string): bigint {
  try {
    return parseAmount(value, field);
  } catch (error) {
    throw new ValidationError('invalid_amount', error instanceof Error ? error.message : String(error));
  }
}

export function callContext(request: FastifyRequest, body: ValueBody | undefined): CallContext {
  return {
    from: callerOf(request),
    value: amount(body?.value, 'value'),
    gasPrice: amount(body?.gasPrice, 'gasPrice'),
  };
}

export function handleParam(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError('bad_handle', `Invalid data request id: ${raw}`);
  }
  return parseInt(raw, 10);
}
