import type { APIGatewayProxyEvent } from 'aws-lambda';
import { GenerationRequestSchema, type GenerationParams } from '../schemas';
import { Logger } from '../utils/logger';

/**
 * The parts of the API Gateway event the proxy reads
 */
export type InboundRequest = Pick<APIGatewayProxyEvent, 'httpMethod' | 'body'> & {
  isBase64Encoded?: boolean;
};

export type ValidationResult =
  | { ok: true; message: 'CORS preflight'; params: null }
  | { ok: true; message: 'Valid request'; params: GenerationParams }
  | { ok: false; message: string; params: null };

function invalid(message: string): ValidationResult {
  return { ok: false, message, params: null };
}

function decodeBody(request: InboundRequest, body: string): string {
  return request.isBase64Encoded ? Buffer.from(body, 'base64').toString('utf-8') : body;
}

/**
 * Validate an inbound request. Never throws.
 *
 * OPTIONS passes with `params: null` (a preflight, not a generation request);
 * a POST passes with the parsed generation parameters.
 */
export function validateRequest(request: InboundRequest): ValidationResult {
  try {
    if (request.httpMethod === 'OPTIONS') {
      return { ok: true, message: 'CORS preflight', params: null };
    }

    if (request.httpMethod !== 'POST') {
      return invalid('Only POST method is supported');
    }

    if (!request.body) {
      return invalid('Request body is required');
    }

    let body: unknown;
    try {
      body = JSON.parse(decodeBody(request, request.body));
    } catch {
      return invalid('Invalid JSON in request body');
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return invalid('Request body must be a JSON object');
    }

    const parsed = GenerationRequestSchema.safeParse(body);
    if (!parsed.success) {
      return invalid(parsed.error.errors[0]?.message ?? 'Invalid request body');
    }

    return { ok: true, message: 'Valid request', params: parsed.data };
  } catch (error) {
    Logger.error('[RequestValidator] Error validating request', error);
    return invalid('Internal validation error');
  }
}
