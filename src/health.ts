/**
 * Active probe for a running bridge's /health endpoint, used by the
 * `status` command.
 * @packageDocumentation
 */

import * as http from 'node:http';

function isHealthy(data: string): boolean {
  try {
    const json: unknown = JSON.parse(data);
    return typeof json === 'object' && json !== null && 'ok' in json && json.ok === true;
  } catch {
    return false;
  }
}

/**
 * Probe a running bridge's /health endpoint.
 * Resolves true if healthy, false on any error/timeout.
 */
export function probeHealth(bridgeUrl: string, timeoutMs = 2000): Promise<boolean> {
  const url = new URL('/health', bridgeUrl);
  return new Promise((resolve) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      let data = '';
      res.setEncoding('utf-8');
      res.on('data', (c: string) => (data += c));
      res.on('end', () => resolve(res.statusCode === 200 && isHealthy(data)));
    });
    req.on('error', () => resolve(false));
    req.on('timeout', () => {
      req.destroy();
      resolve(false);
    });
  });
}
