import { AxiosInstance, AxiosError, InternalAxiosRequestConfig, AxiosResponse } from 'axios';
import { logger } from '../logging/index.js';

const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function elapsed(config: InternalAxiosRequestConfig | undefined): number {
  const start = config ? startTimes.get(config) : undefined;
  return start === undefined ? 0 : Date.now() - start;
}

export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  // Request interceptor
  axiosInstance.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    startTimes.set(config, Date.now());

    if (logger.getConfig().requestsEnabled) {
      logger.debug('HTTP Request', {
        method: config.method?.toUpperCase(),
        url: config.url,
      }, 'http-client');
    }

    return config;
  });

  // Response interceptor
  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      if (logger.getConfig().requestsEnabled) {
        logger.debug('HTTP Response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          duration_ms: elapsed(response.config),
        }, 'http-client');
      }

      return response;
    },
    (error: AxiosError) => {
      logger.notice('HTTP Response Error', {
        method: error.config?.method?.toUpperCase(),
        url: error.config?.url,
        status: error.response?.status,
        code: error.code,
        duration_ms: elapsed(error.config),
        message: error.message,
      }, 'http-client');

      return Promise.reject(error);
    }
  );
}
