/**
 * HTTP client utility with retry logic, timeout handling and cancellation
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosError, GenericAbortSignal } from 'axios';
import { config } from '../config';
import { logger } from '../config/logger';
import { GeofencingError, ErrorCode, httpStatusToErrorCode, isRetryableError } from '../errors';

export interface HttpClientOptions {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  retryAttempts?: number;
  retryDelayMs?: number;
}

export class HttpClient {
  private client: AxiosInstance;
  private retryAttempts: number;
  private retryDelayMs: number;

  constructor(options: HttpClientOptions) {
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout ?? config.zoneApi.requestTimeoutMs,
      headers: {
        Accept: 'application/json',
        ...options.headers,
      },
    });

    this.retryAttempts = options.retryAttempts ?? config.http.retryAttempts;
    this.retryDelayMs = options.retryDelayMs ?? config.http.retryDelayMs;
  }

  async get<T>(url: string, requestConfig?: AxiosRequestConfig): Promise<T> {
    return this.requestWithRetry<T>('GET', url, requestConfig);
  }

  private async requestWithRetry<T>(
    method: string,
    url: string,
    axiosConfig?: AxiosRequestConfig
  ): Promise<T> {
    let lastError: GeofencingError | undefined;
    const signal = axiosConfig?.signal;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        logger.debug(`${method} ${url}`, { attempt, maxAttempts: this.retryAttempts });
        const response = await this.client.request<T>({ method, url, ...axiosConfig });
        return response.data;
      } catch (error) {
        lastError = this.handleError(error, method, url);

        if (!isRetryableError(lastError) || attempt === this.retryAttempts || signal?.aborted) {
          throw lastError;
        }

        const delayMs = this.retryDelayMs * Math.pow(2, attempt - 1);
        logger.warn(`Request failed, retrying in ${delayMs}ms`, {
          attempt,
          error: lastError.message,
        });

        await this.sleep(delayMs, signal);

        if (signal?.aborted) {
          throw new GeofencingError(ErrorCode.CANCELLED, 'Request cancelled', {
            details: { method, url },
          });
        }
      }
    }

    throw lastError || new GeofencingError(ErrorCode.UNKNOWN, 'Request failed after retries');
  }

  private handleError(error: unknown, method: string, url: string): GeofencingError {
    if (axios.isCancel(error)) {
      return new GeofencingError(ErrorCode.CANCELLED, 'Request cancelled', {
        details: { method, url },
      });
    }

    if (error instanceof AxiosError) {
      if (!error.response) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          return new GeofencingError(ErrorCode.TIMEOUT, 'Request timeout', {
            originalError: error,
          });
        }

        if (error.code === 'ECONNREFUSED') {
          return new GeofencingError(ErrorCode.CONNECTION_REFUSED, 'Connection refused', {
            originalError: error,
          });
        }

        return new GeofencingError(ErrorCode.NETWORK_ERROR, error.message, {
          originalError: error,
        });
      }

      const status = error.response.status;
      return new GeofencingError(httpStatusToErrorCode(status), `HTTP ${status}: ${error.message}`, {
        statusCode: status,
        details: { data: error.response.data, method, url },
        originalError: error,
      });
    }

    if (error instanceof Error) {
      return new GeofencingError(ErrorCode.UNKNOWN, error.message, {
        originalError: error,
      });
    }

    return new GeofencingError(ErrorCode.UNKNOWN, 'An unknown error occurred');
  }

  /**
   * Resolves after `ms`, or as soon as the signal aborts
   */
  private sleep(ms: number, signal?: GenericAbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener?.('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener?.('abort', onAbort);
    });
  }
}
