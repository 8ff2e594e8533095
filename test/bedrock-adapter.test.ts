/**
 * Bedrock Adapter Tests
 *
 * The SDK client is real but `send` is stubbed, so nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AccessDeniedException,
  BedrockRuntimeClient,
  InvokeModelCommand,
  ThrottlingException,
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { BedrockAdapter, ModelRuntimeFactory, ProviderError } from '../src/llm';

type HttpHandlerOptions = ConstructorParameters<typeof NodeHttpHandler>[0];

const { handlerOptions } = vi.hoisted(() => ({
  handlerOptions: new Array<HttpHandlerOptions>(),
}));

// Records the options every NodeHttpHandler is built with
vi.mock('@smithy/node-http-handler', async importOriginal => {
  const actual = await importOriginal<typeof import('@smithy/node-http-handler')>();

  class RecordingHttpHandler extends actual.NodeHttpHandler {
    constructor(options?: HttpHandlerOptions) {
      super(options);
      handlerOptions.push(options);
    }
  }

  return { ...actual, NodeHttpHandler: RecordingHttpHandler };
});

function encode(body: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(body));
}

describe('BedrockAdapter', () => {
  let client: BedrockRuntimeClient;

  beforeEach(() => {
    client = new BedrockRuntimeClient({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
  });

  it('sends one InvokeModel command with the JSON payload', async () => {
    const send = vi.spyOn(client, 'send').mockImplementation(async () => ({
      body: encode({ completion: 'hi' }),
      contentType: 'application/json',
      $metadata: { requestId: 'abc-123' },
    }));
    const adapter = new BedrockAdapter({ client });

    await adapter.invokeModel('some.other.model', { prompt: 'hi', max_tokens: 10 });

    expect(send).toHaveBeenCalledTimes(1);
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(InvokeModelCommand);
    expect(command.input).toEqual({
      modelId: 'some.other.model',
      contentType: 'application/json',
      accept: 'application/json',
      body: '{"prompt":"hi","max_tokens":10}',
    });
  });

  it('decodes the response body and returns the request id', async () => {
    vi.spyOn(client, 'send').mockImplementation(async () => ({
      body: encode({ content: [{ text: 'Hello' }], usage: { input_tokens: 1 } }),
      contentType: 'application/json',
      $metadata: { requestId: 'abc-123' },
    }));
    const adapter = new BedrockAdapter({ client });

    const output = await adapter.invokeModel('anthropic.claude-3-haiku-20240307-v1:0', {});

    expect(output).toEqual({
      body: { content: [{ text: 'Hello' }], usage: { input_tokens: 1 } },
      requestId: 'abc-123',
    });
  });

  it.each([
    [new ThrottlingException({ $metadata: {}, message: 'Too many requests' }), 'ThrottlingException'],
    [new AccessDeniedException({ $metadata: {}, message: 'Not authorized' }), 'AccessDeniedException'],
  ])('classifies %s as a provider error', async (exception, code) => {
    vi.spyOn(client, 'send').mockImplementation(async () => {
      throw exception;
    });
    const adapter = new BedrockAdapter({ client });

    const failure = adapter.invokeModel('some.other.model', {});

    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toMatchObject({ code, message: exception.message });
  });

  it('lets unclassified failures through unchanged', async () => {
    const networkError = new Error('socket hang up');
    vi.spyOn(client, 'send').mockImplementation(async () => {
      throw networkError;
    });
    const adapter = new BedrockAdapter({ client });

    await expect(adapter.invokeModel('some.other.model', {})).rejects.toBe(networkError);
  });

  it('treats an undecodable body as an unclassified failure', async () => {
    vi.spyOn(client, 'send').mockImplementation(async () => ({
      body: new TextEncoder().encode('not json'),
      $metadata: {},
    }));
    const adapter = new BedrockAdapter({ client });

    await expect(adapter.invokeModel('some.other.model', {})).rejects.toBeInstanceOf(SyntaxError);
  });

  it('destroys the SDK client', () => {
    const destroy = vi.spyOn(client, 'destroy');
    const adapter = new BedrockAdapter({ client });

    adapter.destroy();

    expect(destroy).toHaveBeenCalledTimes(1);
  });

  describe('client construction', () => {
    beforeEach(() => {
      handlerOptions.length = 0;
    });

    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('installs a NodeHttpHandler with the configured request timeout', async () => {
      const adapter = new BedrockAdapter({ region: 'eu-west-1', timeout: 1234 });
      const sdkClient = adapter.getClient();

      expect(sdkClient.config.requestHandler).toBeInstanceOf(NodeHttpHandler);
      expect(handlerOptions).toEqual([{ requestTimeout: 1234, throwOnRequestTimeout: true }]);
      expect(await sdkClient.config.region()).toBe('eu-west-1');
    });

    it('passes the timeout through the factory', () => {
      const runtime = ModelRuntimeFactory.create({
        provider: 'bedrock',
        region: 'eu-west-1',
        timeout: 1234,
      });

      expect(runtime).toBeInstanceOf(BedrockAdapter);
      expect(handlerOptions).toEqual([{ requestTimeout: 1234, throwOnRequestTimeout: true }]);
    });

    it('keeps the SDK default handler without a timeout', () => {
      const adapter = new BedrockAdapter({ region: 'eu-west-1' });

      expect(adapter.getClient().config.requestHandler).not.toBeInstanceOf(NodeHttpHandler);
      expect(handlerOptions).toEqual([]);
    });

    it('falls back to the default region instead of the environment', async () => {
      vi.stubEnv('AWS_REGION', 'ap-southeast-2');

      const adapter = new BedrockAdapter();

      expect(await adapter.getClient().config.region()).toBe('us-east-1');
    });
  });
});
