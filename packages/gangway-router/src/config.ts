/**
 * Router Configuration
 * Loaded from environment variables; fail-closed on invalid values.
 */

import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_APP_PORT } from 'gangway-endpoint';
import { RouterConfigError } from './errors';
import { buildRouteTable, DEFAULT_API_TIMEOUTS, DEFAULT_ENTRY_DOCUMENT } from './table';
import { ApiPrefixMode, ProxyTimeouts, RouteRule, UpstreamAddress } from './types';

const PortSchema = z.coerce.number().int().min(1).max(65535);
const DurationSchema = z.coerce.number().int().positive();

export const RouterEnvSchema = z.object({
  GANGWAY_PORT: PortSchema.default(DEFAULT_APP_PORT),
  GANGWAY_HOST: z.string().min(1).default('0.0.0.0'),
  GANGWAY_BACKEND_HOST: z.string().min(1).default('127.0.0.1'),
  GANGWAY_BACKEND_PORT: PortSchema.default(8000),
  GANGWAY_STATIC_ROOT: z.string().min(1).default('ui/dist'),
  GANGWAY_ENTRY_DOCUMENT: z.string().min(1).default(DEFAULT_ENTRY_DOCUMENT),
  GANGWAY_API_PREFIX: z.enum(['preserve', 'strip']).default('preserve'),
  GANGWAY_API_CONNECT_TIMEOUT_MS: DurationSchema.default(DEFAULT_API_TIMEOUTS.connectMs),
  GANGWAY_API_READ_TIMEOUT_MS: DurationSchema.default(DEFAULT_API_TIMEOUTS.readMs),
  GANGWAY_CORS_ORIGIN: z.string().min(1).optional()
});

export interface RouterConfig {
  /** The single externally reachable port */
  port: number;
  host: string;
  backend: UpstreamAddress;
  staticRoot: string;
  entryDocument: string;
  apiPrefix: ApiPrefixMode;
  apiTimeouts: ProxyTimeouts;
  corsOrigin?: string;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function loadRouterConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RouterConfig {
  const parsed = RouterEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new RouterConfigError(`Invalid router configuration: ${formatIssues(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    port: vars.GANGWAY_PORT,
    host: vars.GANGWAY_HOST,
    backend: { host: vars.GANGWAY_BACKEND_HOST, port: vars.GANGWAY_BACKEND_PORT },
    staticRoot: path.resolve(cwd, vars.GANGWAY_STATIC_ROOT),
    entryDocument: vars.GANGWAY_ENTRY_DOCUMENT,
    apiPrefix: vars.GANGWAY_API_PREFIX,
    apiTimeouts: {
      connectMs: vars.GANGWAY_API_CONNECT_TIMEOUT_MS,
      readMs: vars.GANGWAY_API_READ_TIMEOUT_MS,
      sendMs: vars.GANGWAY_API_READ_TIMEOUT_MS
    },
    corsOrigin: vars.GANGWAY_CORS_ORIGIN
  };
}

export function routeTableFromConfig(config: RouterConfig): RouteRule[] {
  return buildRouteTable({
    backend: config.backend,
    staticRoot: config.staticRoot,
    entryDocument: config.entryDocument,
    apiPrefix: config.apiPrefix,
    apiTimeouts: config.apiTimeouts
  });
}
