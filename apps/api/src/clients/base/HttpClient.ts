import axios, {
  AxiosInstance,
  AxiosRequestConfig,
  AxiosError,
  InternalAxiosRequestConfig,
} from 'axios';
import { logger } from '../../utils/logger';

export interface ClientConfig {
  baseUrl: string;
  apiKey?: string;
  timeout?: number;
  headers?: Record<string, string>;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

interface RetryConfig extends InternalAxiosRequestConfig {
  __retryCount?: number;
}

const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND']);

export class HttpClient {
  protected axiosInstance: AxiosInstance;
  protected serviceName: string;
  private maxRetries: number;
  private retryBaseDelayMs: number;

  constructor(config: ClientConfig, serviceName: string = 'http') {
    this.serviceName = serviceName;
    this.maxRetries = config.maxRetries ?? 2;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout || 10000,
      headers: {
        Accept: 'application/json',
        ...(config.apiKey && { 'X-Api-Key': config.apiKey }),
        ...config.headers,
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    // Request interceptor for logging
    this.axiosInstance.interceptors.request.use(
      (config) => {
        logger.debug(
          `[${this.serviceName}] ${config.method?.toUpperCase()} ${config.url}`
        );
        return config;
      },
      (error: unknown) => {
        logger.error(`[${this.serviceName}] Request error:`, error);
        return Promise.reject(error);
      }
    );

    // Response interceptor for error handling and retry
    this.axiosInstance.interceptors.response.use(
      (response) => response,
      async (error: AxiosError) => {
        const config: RetryConfig | undefined = error.config;

        if (!config) {
          return Promise.reject(error);
        }

        config.__retryCount = config.__retryCount || 0;

        if (config.__retryCount >= this.maxRetries) {
          if (this.maxRetries > 0) {
            logger.error(
              `[${this.serviceName}] Max retries (${this.maxRetries}) reached for ${config.url}`
            );
          }
          return Promise.reject(error);
        }

        // Only retry on network errors or 5xx server errors
        const shouldRetry =
          (error.code !== undefined && RETRYABLE_CODES.has(error.code)) ||
          (error.response !== undefined && error.response.status >= 500);

        if (!shouldRetry) {
          return Promise.reject(error);
        }

        config.__retryCount += 1;

        // Exponential backoff from the base delay
        const delay = Math.pow(2, config.__retryCount - 1) * this.retryBaseDelayMs;

        logger.warn(
          `[${this.serviceName}] Retrying request (${config.__retryCount}/${this.maxRetries}) after ${delay}ms: ${config.url}`
        );

        await new Promise((resolve) => setTimeout(resolve, delay));

        return this.axiosInstance(config);
      }
    );
  }

  async get<T>(url: string, params?: QueryParams, config?: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.axiosInstance.get<T>(url, { ...config, params });
      return response.data;
    } catch (error) {
      this.handleError(error, 'GET', url);
      throw error;
    }
  }

  private handleError(error: unknown, method: string, url: string): void {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      logger.error(
        `[${this.serviceName}] ${method} ${url} failed with status ${status ?? 'n/a'}: ${error.message}`
      );
    } else {
      logger.error(
        `[${this.serviceName}] ${method} ${url} failed: ${String(error)}`
      );
    }
  }
}
