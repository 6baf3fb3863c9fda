/**
 * HTTPS Request with Proxy Support
 *
 * Makes HTTPS requests that respect HTTPS_PROXY / HTTP_PROXY. Node's
 * built-in fetch() ignores those variables, so requests go through
 * `https.request` with a `tunnel` CONNECT agent when a proxy is set.
 */

import * as https from 'https';
import type { Agent, IncomingHttpHeaders } from 'http';
import { URL } from 'url';
import * as tunnel from 'tunnel';

export interface HttpsRequestOptions {
  method?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpsResponse {
  status: number;
  data: string;
  headers: IncomingHttpHeaders;
}

const MAX_REDIRECTS = 10;
const DEFAULT_TIMEOUT_MS = 30000;

function proxyAgent(): Agent | undefined {
  const proxyUrl = process.env.HTTPS_PROXY || process.env.HTTP_PROXY;
  if (!proxyUrl) return undefined;

  const proxy = new URL(proxyUrl);
  const proxyAuth =
    proxy.username || proxy.password
      ? `${decodeURIComponent(proxy.username)}:${decodeURIComponent(proxy.password)}`
      : undefined;

  return tunnel.httpsOverHttp({
    proxy: {
      host: proxy.hostname,
      port: proxy.port ? parseInt(proxy.port, 10) : 80,
      ...(proxyAuth ? { proxyAuth } : {}),
    },
  });
}

/**
 * Make HTTPS request with automatic proxy support and redirect following
 */
export function httpsRequest(
  url: string,
  options: HttpsRequestOptions = {},
  redirectCount: number = 0
): Promise<HttpsResponse> {
  if (redirectCount >= MAX_REDIRECTS) {
    return Promise.reject(new Error('Too many redirects'));
  }

  return new Promise((resolve, reject) => {
    const urlObj = new URL(url);
    const requestOptions: https.RequestOptions = {
      method: options.method || 'GET',
      hostname: urlObj.hostname,
      port: urlObj.port || 443,
      path: urlObj.pathname + urlObj.search,
      headers: { ...options.headers },
      agent: proxyAgent(),
    };

    const req = https.request(requestOptions, (res) => {
      if (res.statusCode && res.statusCode >= 300 && res.statusCode < 400 && res.headers.location) {
        const redirectUrl = new URL(res.headers.location, url).toString();
        console.log(`[https-proxy-request] Following redirect to: ${redirectUrl}`);
        res.resume();
        httpsRequest(redirectUrl, options, redirectCount + 1).then(resolve, reject);
        return;
      }

      // Decode once at the end; a multibyte character may straddle two chunks
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      res.on('end', () => {
        resolve({
          status: res.statusCode || 0,
          data: Buffer.concat(chunks).toString('utf8'),
          headers: res.headers,
        });
      });
      res.on('error', reject);
    });

    req.on('error', reject);
    req.setTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, () => {
      req.destroy(new Error(`Request to ${urlObj.hostname} timed out`));
    });

    req.end();
  });
}
