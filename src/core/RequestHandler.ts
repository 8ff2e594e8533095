import type { Context } from 'aws-lambda';
import { Logger } from '../utils/logger';
import { validateRequest, type InboundRequest, type ValidationResult } from '../validators';
import { INTERNAL_ERROR_MESSAGE, type ModelInvoker } from './ModelInvoker';
import { createResponse, epochSeconds, type ResponseEnvelope } from './response';

export interface RequestHandlerDeps {
  invoker: Pick<ModelInvoker, 'invoke'>;
  validate?: (request: InboundRequest) => ValidationResult;
}

export type ExecutionContext = Pick<Context, 'awsRequestId'>;

export type RequestHandler = (
  event: InboundRequest,
  context?: ExecutionContext
) => Promise<ResponseEnvelope>;

interface ResponseMetadata {
  execution_time_ms: number;
  timestamp: number;
  request_id: string | null;
}

function buildMetadata(startTime: number, context?: ExecutionContext): ResponseMetadata {
  const elapsedMs = performance.now() - startTime;
  return {
    execution_time_ms: Math.round(elapsedMs * 100) / 100,
    timestamp: epochSeconds(),
    request_id: context?.awsRequestId ?? null,
  };
}

/**
 * Build the Lambda handler: validate, invoke the model once, wrap the result.
 *
 * Every path resolves to a response envelope; nothing is thrown to the caller.
 */
export function createRequestHandler(deps: RequestHandlerDeps): RequestHandler {
  const validate = deps.validate ?? validateRequest;

  return async (event, context) => {
    const startTime = performance.now();

    try {
      Logger.info(`[RequestHandler] Received ${event.httpMethod} request`);
      Logger.debug(`[RequestHandler] Event: ${JSON.stringify(event, null, 2)}`);

      const validation = validate(event);

      if (!validation.ok) {
        Logger.warn(`[RequestHandler] Rejected request: ${validation.message}`);
        return createResponse(400, {
          error: true,
          message: validation.message,
          timestamp: epochSeconds(),
        });
      }

      if (validation.params === null) {
        return createResponse(200, {
          message: 'CORS preflight successful',
          timestamp: epochSeconds(),
        });
      }

      const { prompt, max_tokens, temperature, top_p } = validation.params;

      const result = await deps.invoker.invoke(prompt, {
        maxTokens: max_tokens,
        temperature,
        topP: top_p,
      });

      const metadata = buildMetadata(startTime, context);

      if (result.success) {
        Logger.info(
          `[RequestHandler] ✓ Processed request in ${metadata.execution_time_ms}ms`
        );
        return createResponse(200, {
          success: true,
          content: result.content,
          model_id: result.modelId,
          usage: result.usage,
          metadata,
        });
      }

      Logger.error(
        `[RequestHandler] ✗ Failed to process request: ${result.error.code} - ${result.error.message}`
      );
      return createResponse(500, {
        success: false,
        error: result.error,
        metadata,
      });
    } catch (error) {
      Logger.error('[RequestHandler] ✗ Unexpected error in handler', error);
      return createResponse(500, {
        success: false,
        error: {
          code: 'InternalServerError',
          message: INTERNAL_ERROR_MESSAGE,
        },
        metadata: buildMetadata(startTime, context),
      });
    }
  };
}
