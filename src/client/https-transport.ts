/**
 * Minimal HTTPS transport for Azure DevOps calls.
 * The client depends on the `HttpTransport` signature so tests can substitute an in-process fake.
 */

import * as https from 'https';

export interface HttpRequest {
  url: string;
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export const httpsTransport: HttpTransport = (request) => {
  return new Promise((resolve, reject) => {
    const urlParts = new URL(request.url);

    // Never send a PAT over plaintext
    if (urlParts.protocol !== 'https:') {
      reject(new Error(`Refusing to send authenticated request over non-HTTPS protocol '${urlParts.protocol}'`));
      return;
    }

    const headers: Record<string, string | number> = { ...request.headers };
    if (request.body !== undefined) {
      headers['Content-Length'] = Buffer.byteLength(request.body);
    }

    const req = https.request(
      {
        hostname: urlParts.hostname,
        port: urlParts.port || 443,
        path: urlParts.pathname + urlParts.search,
        method: request.method,
        headers,
        timeout: request.timeoutMs,
      },
      (res) => {
        let data = '';
        res.setEncoding('utf8');

        res.on('data', (chunk: string) => {
          data += chunk;
        });

        res.on('end', () => {
          resolve({ statusCode: res.statusCode ?? 0, body: data });
        });

        res.on('error', reject);
      }
    );

    req.on('timeout', () => {
      req.destroy(new Error(`Request timed out after ${request.timeoutMs}ms`));
    });

    req.on('error', reject);

    if (request.body !== undefined) {
      req.write(request.body);
    }

    req.end();
  });
};
