/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances, used by retrievers and LLM clients.
 */

import axios, { AxiosError, AxiosInstance, AxiosProxyConfig, CreateAxiosDefaults } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - long-running operations
  VERY_LONG: 300000, // 5 minutes - LLM calls over large contexts
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 2,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 2,
  timeout: 60000,
});

/**
 * Parse a proxy server URL (protocol://host:port) into axios proxy settings
 */
export function parseProxyUrl(proxyUrl: string | undefined): AxiosProxyConfig | undefined {
  if (!proxyUrl) return undefined;
  try {
    const parsed = new URL(proxyUrl);
    const defaultPort = parsed.protocol === 'https:' ? 443 : 80;
    return {
      protocol: parsed.protocol.replace(/:$/, ''),
      host: parsed.hostname,
      port: parsed.port ? parseInt(parsed.port, 10) : defaultPort,
      ...(parsed.username && {
        auth: { username: decodeURIComponent(parsed.username), password: decodeURIComponent(parsed.password) },
      }),
    };
  } catch (error) {
    logger.error({ proxyUrl, error }, 'Unable to use proxy, invalid proxy server url');
    return undefined;
  }
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 * @returns Configured axios instance
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
      const isTimeout = error.code === 'ECONNABORTED' || error.message?.includes('timeout');
      logger.debug(
        {
          url: error.config?.url,
          method: error.config?.method,
          status: error.response?.status,
          code: error.code,
          timeout: isTimeout ? error.config?.timeout : undefined,
        },
        isTimeout ? 'HTTP request timed out' : 'HTTP request failed'
      );
      return Promise.reject(error);
    }
  );

  return client;
}
