/**
 * Centralized HTTP Client Configuration
 *
 * Shared HTTP/HTTPS agents and a factory for configured axios instances,
 * used for the PDF download and the Telegram Bot API.
 */

import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

export const HTTP_TIMEOUTS = {
  STANDARD: 30000,
} as const;

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 2,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 2,
});

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    // If no timeout is set, use the default STANDARD timeout
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
    }
    logger.debug(
      // baseURL is left out: the Bot API carries the token in it
      { method: requestConfig.method, url: requestConfig.url },
      'HTTP request'
    );
    return requestConfig;
  });

  return client;
}
