/**
 * Request Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { validateRequest, type InboundRequest } from '../src/validators';

function post(body: unknown): InboundRequest {
  return { httpMethod: 'POST', body: JSON.stringify(body) };
}

describe('validateRequest', () => {
  describe('method', () => {
    it('treats OPTIONS as a preflight with no params', () => {
      expect(validateRequest({ httpMethod: 'OPTIONS', body: null })).toEqual({
        ok: true,
        message: 'CORS preflight',
        params: null,
      });
    });

    it.each(['GET', 'PUT', 'DELETE', 'PATCH', 'post'])('rejects %s', method => {
      const result = validateRequest({ httpMethod: method, body: '{"prompt":"hi"}' });
      expect(result).toEqual({
        ok: false,
        message: 'Only POST method is supported',
        params: null,
      });
    });
  });

  describe('body', () => {
    it.each([null, ''])('requires a body (%j)', body => {
      const result = validateRequest({ httpMethod: 'POST', body });
      expect(result.ok).toBe(false);
      expect(result.message).toBe('Request body is required');
    });

    it('rejects malformed JSON', () => {
      const result = validateRequest({ httpMethod: 'POST', body: '{"prompt": ' });
      expect(result.message).toBe('Invalid JSON in request body');
    });

    it.each(['[]', '42', '"hello"', 'null'])('rejects non-object JSON %s', body => {
      const result = validateRequest({ httpMethod: 'POST', body });
      expect(result.ok).toBe(false);
      expect(result.message).toBe('Request body must be a JSON object');
    });

    it('decodes base64-encoded bodies', () => {
      const encoded = Buffer.from(JSON.stringify({ prompt: 'héllo' }), 'utf-8').toString('base64');
      const result = validateRequest({ httpMethod: 'POST', body: encoded, isBase64Encoded: true });
      expect(result).toEqual({ ok: true, message: 'Valid request', params: { prompt: 'héllo' } });
    });
  });

  describe('prompt', () => {
    it.each([{}, { prompt: '' }, { prompt: null }, { prompt: 7 }])(
      'requires a non-empty string prompt (%j)',
      body => {
        const result = validateRequest(post(body));
        expect(result.ok).toBe(false);
        expect(result.message).toBe('Prompt is required');
      }
    );

    it('reports the prompt before other invalid fields', () => {
      const result = validateRequest(post({ max_tokens: -1 }));
      expect(result.message).toBe('Prompt is required');
    });
  });

  describe('max_tokens', () => {
    it.each([0, -5, 1.5, '100', true, null])('rejects %j', maxTokens => {
      const result = validateRequest(post({ prompt: 'hi', max_tokens: maxTokens }));
      expect(result.ok).toBe(false);
      expect(result.message).toBe('max_tokens must be a positive integer');
    });

    it('accepts a positive integer', () => {
      const result = validateRequest(post({ prompt: 'hi', max_tokens: 1 }));
      expect(result.params).toEqual({ prompt: 'hi', max_tokens: 1 });
    });
  });

  describe('temperature and top_p', () => {
    it.each([-0.1, 1.01, '0.5', null])('rejects temperature %j', temperature => {
      const result = validateRequest(post({ prompt: 'hi', temperature }));
      expect(result.message).toBe('temperature must be a number between 0 and 1');
    });

    it.each([-1, 2, 'high'])('rejects top_p %j', topP => {
      const result = validateRequest(post({ prompt: 'hi', top_p: topP }));
      expect(result.message).toBe('top_p must be a number between 0 and 1');
    });

    it('accepts the inclusive bounds', () => {
      const result = validateRequest(post({ prompt: 'hi', temperature: 0, top_p: 1 }));
      expect(result).toEqual({
        ok: true,
        message: 'Valid request',
        params: { prompt: 'hi', temperature: 0, top_p: 1 },
      });
    });

    it('reports temperature before top_p', () => {
      const result = validateRequest(post({ prompt: 'hi', temperature: 3, top_p: 3 }));
      expect(result.message).toBe('temperature must be a number between 0 and 1');
    });
  });

  it('drops unknown fields', () => {
    const result = validateRequest(
      post({ prompt: 'Write a haiku', max_tokens: 50, temperature: 0.2, top_p: 0.8, stream: true })
    );
    expect(result).toEqual({
      ok: true,
      message: 'Valid request',
      params: { prompt: 'Write a haiku', max_tokens: 50, temperature: 0.2, top_p: 0.8 },
    });
  });

  it('reports unexpected failures as an internal validation error', () => {
    const request = {
      get httpMethod(): string {
        throw new Error('boom');
      },
      body: null,
    };
    expect(validateRequest(request)).toEqual({
      ok: false,
      message: 'Internal validation error',
      params: null,
    });
  });
});
