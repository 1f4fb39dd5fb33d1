import axios, { AxiosHeaders } from 'axios';
import { createAxiosTransport, headerValue, parseRetryAfter } from '../src/services/HttpTransport';
import { CancelledError, RequestError } from '../src/types/errors';

describe('HttpTransport', () => {
  const requestSpy = jest.spyOn(axios, 'request');

  beforeEach(() => {
    requestSpy.mockReset();
  });

  afterAll(() => {
    requestSpy.mockRestore();
  });

  describe('createAxiosTransport', () => {
    test('should pass the request through and hand back any status', async () => {
      requestSpy.mockResolvedValue({
        data: { error: { message: 'nope' } },
        status: 400,
        statusText: 'Bad Request',
        headers: { 'x-ms-request-id': 'abc' },
        config: { headers: new AxiosHeaders() }
      });

      const transport = createAxiosTransport(1500);
      const response = await transport({
        method: 'POST',
        url: 'https://language.test/jobs',
        headers: { 'Ocp-Apim-Subscription-Key': 'test-secret' },
        body: { kind: 'Conversation' }
      });

      expect(response).toEqual({
        status: 400,
        headers: { 'x-ms-request-id': 'abc' },
        data: { error: { message: 'nope' } }
      });
      expect(requestSpy).toHaveBeenCalledWith(
        expect.objectContaining({
          method: 'POST',
          url: 'https://language.test/jobs',
          data: { kind: 'Conversation' },
          timeout: 1500
        })
      );
    });

    test('should turn a network failure into a transient request error', async () => {
      requestSpy.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const transport = createAxiosTransport(1000);
      const attempt = transport({ method: 'GET', url: 'https://language.test/jobs/1', headers: {} });

      await expect(attempt).rejects.toBeInstanceOf(RequestError);
      await expect(attempt).rejects.toMatchObject({
        kind: 'transient',
        message: 'Network error calling https://language.test/jobs/1: connect ECONNREFUSED'
      });
    });

    test('should report an aborted request as cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      requestSpy.mockRejectedValue(new Error('canceled'));

      const transport = createAxiosTransport(1000);
      await expect(
        transport({ method: 'GET', url: 'https://language.test/jobs/1', headers: {}, signal: controller.signal })
      ).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('headerValue', () => {
    test('should look headers up case-insensitively', () => {
      expect(headerValue({ 'Operation-Location': 'https://x/jobs/1' }, 'operation-location')).toBe('https://x/jobs/1');
    });

    test('should take the first value of a repeated header', () => {
      expect(headerValue({ 'retry-after': ['3', '9'] }, 'Retry-After')).toBe('3');
    });

    test('should stringify numeric values', () => {
      expect(headerValue({ 'retry-after': 4 }, 'retry-after')).toBe('4');
    });

    test('should return undefined for a missing header', () => {
      expect(headerValue({}, 'retry-after')).toBeUndefined();
    });
  });

  describe('parseRetryAfter', () => {
    const now = Date.parse('Tue, 21 Oct 2025 07:28:00 GMT');

    test('should read delta-seconds', () => {
      expect(parseRetryAfter('5', now)).toBe(5000);
      expect(parseRetryAfter(' 0.5 ', now)).toBe(500);
    });

    test('should read an HTTP date relative to now', () => {
      expect(parseRetryAfter('Tue, 21 Oct 2025 07:28:30 GMT', now)).toBe(30000);
    });

    test('should clamp a date in the past to zero', () => {
      expect(parseRetryAfter('Tue, 21 Oct 2025 07:27:00 GMT', now)).toBe(0);
    });

    test('should ignore missing, negative or unreadable values', () => {
      expect(parseRetryAfter(undefined, now)).toBeUndefined();
      expect(parseRetryAfter('', now)).toBeUndefined();
      expect(parseRetryAfter('-3', now)).toBeUndefined();
      expect(parseRetryAfter('soon', now)).toBeUndefined();
    });
  });
});
