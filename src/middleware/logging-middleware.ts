import type { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { logger } from '../logging/index.js';

// Request start times, keyed by the config object axios threads through
const startTimes = new WeakMap<object, number>();

function elapsed(config: InternalAxiosRequestConfig | undefined): number {
  const start = config ? startTimes.get(config) : undefined;
  return start === undefined ? 0 : Date.now() - start;
}

export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  axiosInstance.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    startTimes.set(config, Date.now());

    if (logger.getConfig().requestsEnabled) {
      logger.debug('HTTP Request', {
        method: config.method?.toUpperCase(),
        url: config.url,
        params: config.params,
      }, 'http-client');
    }

    return config;
  });

  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      const duration = elapsed(response.config);
      const success = response.status < 400;

      if (logger.getConfig().requestsEnabled) {
        logger.debug('HTTP Response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          duration_ms: duration,
        }, 'http-client');
      }

      logger.recordMetric({
        tool: 'http_request',
        latency_ms: duration,
        success,
        timestamp: new Date().toISOString(),
        ...(success ? {} : { error: `HTTP ${response.status}` }),
      });

      return response;
    },
    (error: AxiosError) => {
      const duration = elapsed(error.config);

      logger.warning('HTTP Transport Error', {
        method: error.config?.method?.toUpperCase(),
        url: error.config?.url,
        code: error.code,
        duration_ms: duration,
        message: error.message,
      }, 'http-client');

      logger.recordMetric({
        tool: 'http_request',
        latency_ms: duration,
        success: false,
        timestamp: new Date().toISOString(),
        error: error.code ?? 'ERR_NETWORK',
      });

      return Promise.reject(error);
    }
  );
}
