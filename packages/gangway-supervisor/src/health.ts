import fetch from 'node-fetch';
import { HealthCheck, ListenAddress } from './types';

/**
 * Readiness probe: true only for a 2xx answer.
 * Any other status, a refused connection or a timeout means "not ready yet".
 */
export type HealthProbe = (url: string, timeoutMs: number) => Promise<boolean>;

export const DEFAULT_HEALTH_PATH = '/health';

export const httpHealthProbe: HealthProbe = async (url, timeoutMs) => {
  try {
    const response = await fetch(url, { method: 'GET', timeout: timeoutMs });
    await response.text();
    return response.ok;
  } catch (error) {
    return false;
  }
};

/** Wildcard listen addresses are probed over loopback */
export function healthUrl(listen: ListenAddress, check: Pick<HealthCheck, 'path'>): string {
  const wildcard = listen.host === '0.0.0.0' || listen.host === '::';
  const host = wildcard ? '127.0.0.1' : listen.host.includes(':') ? `[${listen.host}]` : listen.host;
  const path = check.path.startsWith('/') ? check.path : `/${check.path}`;
  return `http://${host}:${listen.port}${path}`;
}
