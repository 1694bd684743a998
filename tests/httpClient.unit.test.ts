import { HttpClient } from '../src/utils/httpClient';
import {
  PeppolApiError,
  PeppolAuthenticationError,
  PeppolNotFoundError,
  PeppolValidationError,
} from '../src/errors';
import { mockFetchResponse } from './testUtils';

const VALIDATOR_URL = 'https://validator.example.com/api/validate';

describe('HttpClient', () => {
  let fetchMock: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('Requests and responses', () => {
    it('posts the body as given to the URL as given', async () => {
      fetchMock.mockImplementation(async () => mockFetchResponse('ok', { contentType: 'text/plain' }));
      const client = new HttpClient();

      const response = await client.post(VALIDATOR_URL, '<Invoice/>', {
        headers: { 'Content-Type': 'application/xml' },
      });

      const [calledUrl, init] = fetchMock.mock.calls[0];
      expect(calledUrl).toBe(VALIDATOR_URL);
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('<Invoice/>');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/xml' });
      expect(response.data).toBe('ok');
      expect(response.status).toBe(200);
    });

    it('parses JSON responses', async () => {
      fetchMock.mockImplementation(async () => mockFetchResponse({ valid: true }));
      const client = new HttpClient();

      const response = await client.post(VALIDATOR_URL, '<Invoice/>');

      expect(response.data).toEqual({ valid: true });
    });

    it.each(['application/octet-stream', 'application/pdf', 'application/xml'])(
      'returns %s content as text',
      async (contentType) => {
        fetchMock.mockImplementation(async () => mockFetchResponse('<svrl:schematron-output/>', { contentType }));
        const client = new HttpClient();

        const response = await client.post(VALIDATOR_URL, '<Invoice/>');

        expect(response.data).toBe('<svrl:schematron-output/>');
      }
    );
  });

  describe('Error handling', () => {
    it.each<[number, string, new (...args: never[]) => Error, string]>([
      [401, 'Unauthorized', PeppolAuthenticationError, 'HTTP 401: Unauthorized - denied'],
      [403, 'Forbidden', PeppolAuthenticationError, 'HTTP 403: Forbidden - denied'],
      [404, 'Not Found', PeppolNotFoundError, 'HTTP 404: Not Found - denied'],
      [422, 'Unprocessable Entity', PeppolValidationError, 'HTTP 422: Unprocessable Entity - denied'],
      [503, 'Service Unavailable', PeppolApiError, 'HTTP 503: Service Unavailable - denied'],
    ])('maps HTTP %i to the matching error', async (status, statusText, errorClass, message) => {
      fetchMock.mockImplementation(async () =>
        mockFetchResponse('denied', { status, statusText, contentType: 'text/plain' })
      );
      const client = new HttpClient();

      const request = client.post(VALIDATOR_URL, '<Invoice/>');

      await expect(request).rejects.toBeInstanceOf(errorClass);
      await expect(request).rejects.toThrow(message);
    });

    it('keeps status and body on server errors', async () => {
      fetchMock.mockImplementation(async () =>
        mockFetchResponse('boom', { status: 500, statusText: 'Internal Server Error', contentType: 'text/plain' })
      );
      const client = new HttpClient();

      const error = await client.post(VALIDATOR_URL, '<Invoice/>').catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(PeppolApiError);
      expect(error instanceof PeppolApiError && error.statusCode).toBe(500);
      expect(error instanceof PeppolApiError && error.responseBody).toBe('boom');
    });

    it('wraps network failures', async () => {
      fetchMock.mockRejectedValue(new Error('socket hang up'));
      const client = new HttpClient();

      await expect(client.post(VALIDATOR_URL, '<Invoice/>')).rejects.toThrow(
        new PeppolApiError('Network error: socket hang up')
      );
    });

    it('aborts requests that exceed the timeout', async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
            });
          })
      );
      const client = new HttpClient({ timeout: 10 });

      await expect(client.post(VALIDATOR_URL, '<Invoice/>')).rejects.toThrow(new PeppolApiError('Request timeout'));
    });
  });
});
