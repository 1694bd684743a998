import { PeppolApiError, PeppolAuthenticationError, PeppolNotFoundError, PeppolSdkError, PeppolValidationError } from '../errors';
import { tryCatch } from '../tryCatch';
import { DEFAULT_TIMEOUT } from '../constants';

interface HttpOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

export interface HttpResponse {
  /** Parsed JSON for application/json, the raw text otherwise */
  data: unknown;
  status: number;
  statusText: string;
  headers: Headers;
}

/**
 * Posts documents over native fetch
 * Provides timeout handling, status checking, and JSON or text parsing
 */
export class HttpClient {
  private defaultTimeout: number;

  constructor(config: { timeout?: number } = {}) {
    this.defaultTimeout = config.timeout || DEFAULT_TIMEOUT;
  }

  /**
   * POST a text body
   * @param url Absolute URL
   * @param body Request body, sent as given
   * @param options Headers and timeout
   */
  async post(url: string, body: string, options: HttpOptions = {}): Promise<HttpResponse> {
    const { timeout = this.defaultTimeout, headers = {} } = options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    const { data, error } = await tryCatch(async () => {
      if (process.env.NODE_ENV === 'development') {
        console.log(`[HTTP] POST ${url}`);
      }

      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
      });

      if (process.env.NODE_ENV === 'development') {
        console.log(`[HTTP] Response ${response.status} for ${url}`);
      }

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        this.handleHttpError(response.status, response.statusText, errorText);
      }

      return {
        data: await this.parseResponse(response),
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      };
    });

    clearTimeout(timeoutId);

    if (error) {
      if (error.name === 'AbortError') {
        throw new PeppolApiError('Request timeout');
      }

      if (error instanceof PeppolSdkError) {
        throw error;
      }

      throw new PeppolApiError(`Network error: ${error.message || 'Unknown error'}`);
    }

    return data;
  }

  /**
   * JSON for application/json, text for everything else (SVRL reports included,
   * whatever content type the service labels them with)
   */
  private async parseResponse(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') || '';

    if (contentType.includes('application/json')) {
      return response.json();
    }

    return response.text();
  }

  private handleHttpError(status: number, statusText: string, errorText: string): never {
    const message = `HTTP ${status}: ${statusText}${errorText ? ` - ${errorText}` : ''}`;

    if (status === 401 || status === 403) {
      throw new PeppolAuthenticationError(message);
    } else if (status === 404) {
      throw new PeppolNotFoundError(message);
    } else if (status >= 400 && status < 500) {
      throw new PeppolValidationError(message);
    } else {
      throw new PeppolApiError(message, status, errorText);
    }
  }
}
