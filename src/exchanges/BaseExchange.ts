import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { IPositionSource } from './interfaces/IPositionSource';
import { ExchangeConfig, FetchResult, PositionRecord } from '../types/common';
import { logger } from '../utils/logger';

class UnexpectedStatusError extends Error {
  constructor(public readonly status: number, url?: string) {
    super(`Unexpected status ${status}${url ? ` from ${url}` : ''}`);
    this.name = 'UnexpectedStatusError';
  }
}

export abstract class BaseExchange implements IPositionSource {
  protected config: ExchangeConfig;
  protected httpClient: AxiosInstance;

  constructor(config: ExchangeConfig, httpClient?: AxiosInstance) {
    this.config = config;
    this.httpClient = httpClient ?? axios.create({
      baseURL: config.baseUrl,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'WhalePositionBot/1.0',
      },
    });

    this.setupInterceptors();
  }

  public getName(): string {
    return this.config.name;
  }

  protected setupInterceptors(): void {
    this.httpClient.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        this.handleApiError(error);
        return Promise.reject(error);
      }
    );
  }

  protected handleApiError(error: unknown): void {
    if (!axios.isAxiosError(error)) {
      logger.error(`Unknown error for ${this.config.name}:`, { error: String(error) });
      return;
    }

    if (error.response) {
      const { status, data } = error.response;
      logger.error(`API error for ${this.config.name}:`, {
        status,
        data,
        url: error.config?.url,
      });

      switch (status) {
        case 429:
          logger.warn(`Rate limit exceeded for ${this.config.name}`);
          break;
        case 500:
        case 502:
        case 503:
        case 504:
          logger.error(`Server error for ${this.config.name}`);
          break;
      }
    } else if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      logger.error(`Request to ${this.config.name} timed out:`, { url: error.config?.url });
    } else if (error.request) {
      logger.error(`Network error for ${this.config.name}:`, { message: error.message });
    } else {
      logger.error(`Unknown error for ${this.config.name}:`, { message: error.message });
    }
  }

  /**
   * Single attempt, no retry. Anything but a 200 rejects.
   */
  protected async makeRequest<T>(
    method: 'GET' | 'POST',
    endpoint: string,
    data: unknown,
    timeoutMs: number,
    customConfig?: AxiosRequestConfig
  ): Promise<T> {
    const config: AxiosRequestConfig = {
      method,
      url: endpoint,
      timeout: timeoutMs,
      ...customConfig,
    };

    if (method === 'GET') {
      config.params = data;
    } else {
      config.data = data;
    }

    const response = await this.httpClient.request<T>(config);
    if (response.status !== 200) {
      throw new UnexpectedStatusError(response.status, endpoint);
    }
    return response.data;
  }

  public abstract fetchAllMids(): Promise<Record<string, number>>;
  public abstract fetchMidPrice(symbol: string): Promise<number | null>;
  public abstract fetchPositions(address: string): Promise<FetchResult<PositionRecord[]>>;
}
