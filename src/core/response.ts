import type { APIGatewayProxyResult } from 'aws-lambda';

export type ResponseEnvelope = APIGatewayProxyResult & { headers: Record<string, string> };

export const CORS_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers':
    'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
});

/**
 * Build an API Gateway response with the CORS header set. `headers` are
 * merged over the defaults.
 */
export function createResponse(
  statusCode: number,
  body: object,
  headers?: Record<string, string>
): ResponseEnvelope {
  return Object.freeze({
    statusCode,
    headers: { ...CORS_HEADERS, ...headers },
    body: JSON.stringify(body),
  });
}

/** Current time in whole epoch seconds */
export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
