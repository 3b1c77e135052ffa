/**
 * HTTP client tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { MockHttpClient } from '../src/__mocks__/index.js';
import { HttpClient } from '../src/client/index.js';
import {
  ConnectionError,
  DeserializationError,
  GeminiError,
  InvalidApiKeyError,
  QuotaExceededError,
  TimeoutError,
} from '../src/error/index.js';
import { BASE, spyLogger, testConfig } from './helpers.js';

describe('HttpClient', () => {
  let mockClient: MockHttpClient;
  let client: HttpClient;

  beforeEach(() => {
    mockClient = new MockHttpClient();
    client = new HttpClient(testConfig(mockClient));
  });

  describe('URLs and headers', () => {
    it('should put the key in the query string by default', () => {
      expect(client.buildUrl('models/gemini-2.0-flash:generateContent')).toBe(
        `${BASE}/v1beta/models/gemini-2.0-flash:generateContent?key=test-key`
      );
    });

    it('should append query parameters after the key', () => {
      expect(client.buildUrl('files', { pageSize: '10', pageToken: 'abc' })).toBe(
        `${BASE}/v1beta/files?key=test-key&pageSize=10&pageToken=abc`
      );
    });

    it('should build upload URLs', () => {
      expect(client.buildUploadUrl('files')).toBe(`${BASE}/upload/v1beta/files?key=test-key`);
    });

    it('should send the key as a header when configured', () => {
      const headerClient = new HttpClient(testConfig(mockClient, { authMethod: 'header' }));

      expect(headerClient.buildUrl('files')).toBe(`${BASE}/v1beta/files`);
      expect(headerClient.getHeaders('application/json')).toEqual({
        'x-goog-api-key': 'test-key',
        'Content-Type': 'application/json',
      });
    });

    it('should not send a key header with query auth', () => {
      expect(client.getHeaders()).toEqual({});
    });

    it('should honor a custom base URL and version', () => {
      const custom = new HttpClient(
        testConfig(mockClient, { baseUrl: 'https://proxy.example.test/', apiVersion: 'v1' })
      );
      expect(custom.buildUrl('files')).toBe('https://proxy.example.test/v1/files?key=test-key');
    });
  });

  describe('responses', () => {
    it('should return the body as text', async () => {
      mockClient.enqueueResponse({ status: 200, body: 'plain body', headers: { 'x-trace': 'abc' } });

      const response = await client.fetchText(client.buildUrl('files'));

      expect(response.status).toBe(200);
      expect(response.body).toBe('plain body');
      expect(response.headers.get('x-trace')).toBe('abc');
    });

    it('should validate JSON bodies against a schema', async () => {
      const schema = z.object({ name: z.string() });
      mockClient.enqueueJsonResponse(200, { name: 'files/abc', extra: true });

      const data = await client.fetchJson(client.buildUrl('files/abc'), {}, schema, 'File');
      expect(data).toEqual({ name: 'files/abc' });
    });

    it('should reject bodies that do not match', async () => {
      const schema = z.object({ name: z.string() });
      mockClient.enqueueJsonResponse(200, { name: 42 });

      await expect(client.fetchJson(client.buildUrl('files/abc'), {}, schema, 'File')).rejects.toThrow(
        DeserializationError
      );
    });

    it('should pass the abort signal to fetch', async () => {
      mockClient.enqueueResponse({ status: 200, body: '' });

      await client.fetchText(client.buildUrl('files'), { method: 'DELETE' });

      const request = mockClient.getLastRequest();
      expect(request?.options.method).toBe('DELETE');
      expect(request?.options.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe('errors', () => {
    it('should map API error bodies', async () => {
      mockClient.enqueueErrorResponse(
        429,
        'Resource has been exhausted (e.g. check quota).',
        'RESOURCE_EXHAUSTED',
        { 'retry-after': '7' }
      );

      await expect(client.fetchText(client.buildUrl('files'))).rejects.toMatchObject({
        name: 'QuotaExceededError',
        retryAfter: 7,
      });
    });

    it('should map invalid keys', async () => {
      mockClient.enqueueErrorResponse(400, 'API key not valid. Please pass a valid API key.', 'INVALID_ARGUMENT');

      await expect(client.stream(client.buildUrl('files'))).rejects.toThrow(InvalidApiKeyError);
    });

    it('should map statuses without an error body', async () => {
      mockClient.enqueueResponse({ status: 502, body: 'Bad Gateway' });

      const error = await client.fetchText(client.buildUrl('files')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GeminiError);
      expect(error).toMatchObject({ message: 'HTTP 502: Bad Gateway', type: 'unknown_error', isRetryable: true });
    });

    it('should wrap transport failures', async () => {
      mockClient.enqueueNetworkError('fetch failed');

      await expect(client.fetchText(client.buildUrl('files'))).rejects.toThrow('Connection failed: fetch failed');
      mockClient.enqueueNetworkError();
      await expect(client.stream(client.buildUrl('files'))).rejects.toThrow(ConnectionError);
    });

    it('should keep quota errors distinct from transport errors', async () => {
      mockClient.enqueueErrorResponse(429, 'Quota exceeded', 'RESOURCE_EXHAUSTED');

      const error = await client.stream(client.buildUrl('files')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(QuotaExceededError);
      expect(error).not.toBeInstanceOf(ConnectionError);
    });
  });

  describe('timeouts', () => {
    it('should time out waiting for headers', async () => {
      const slow = new HttpClient(testConfig(mockClient, { connectTimeout: 20, timeout: 5_000 }));
      mockClient.enqueueHang();

      await expect(slow.stream(slow.buildUrl('files'))).rejects.toThrow('No response headers within 20ms');
    });

    it('should time out the whole request', async () => {
      const slow = new HttpClient(testConfig(mockClient, { connectTimeout: 5_000, timeout: 20 }));
      mockClient.enqueueHang();

      const error = await slow.fetchText(slow.buildUrl('files')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ message: 'Request timed out after 20ms', duration: 20 });
    });

    it('should keep the request timer running while a stream is open', async () => {
      const slow = new HttpClient(testConfig(mockClient, { connectTimeout: 5_000, timeout: 20 }));
      mockClient.enqueueStreamingResponse(['['], { keepOpen: true });

      const opened = await slow.stream(slow.buildUrl('files'));
      expect(opened.timeoutError()).toBeUndefined();

      await new Promise<void>((resolve) => opened.signal.addEventListener('abort', () => resolve()));

      expect(opened.timeoutError()).toMatchObject({ name: 'TimeoutError', message: 'Request timed out after 20ms' });
      opened.release();
    });

    it('should stop the request timer on release', async () => {
      const slow = new HttpClient(testConfig(mockClient, { connectTimeout: 5_000, timeout: 20 }));
      mockClient.enqueueStreamingResponse(['['], { keepOpen: true });

      const opened = await slow.stream(slow.buildUrl('files'));
      opened.release();
      await new Promise((resolve) => setTimeout(resolve, 40));

      expect(opened.signal.aborted).toBe(false);
      expect(opened.timeoutError()).toBeUndefined();
    });
  });

  describe('logging', () => {
    it('should redact the key from logged URLs', async () => {
      const logger = spyLogger();
      const logged = new HttpClient(testConfig(mockClient, { logger }));
      mockClient.enqueueResponse({ status: 200, body: '{}' });

      await logged.fetchText(logged.buildUrl('files'));

      expect(logger.info).toHaveBeenCalledWith('Sending request', {
        method: 'GET',
        url: `${BASE}/v1beta/files?key=[REDACTED]`,
      });
    });

    it('should warn on failed requests', async () => {
      const logger = spyLogger();
      const logged = new HttpClient(testConfig(mockClient, { logger }));
      mockClient.enqueueErrorResponse(404, 'File not found', 'NOT_FOUND');

      await expect(logged.fetchText(logged.buildUrl('files/x'))).rejects.toThrow('Not found: File not found');

      expect(logger.warn).toHaveBeenCalledWith('Request failed', {
        status: 404,
        apiStatus: 'NOT_FOUND',
        message: 'File not found',
      });
    });
  });
});
