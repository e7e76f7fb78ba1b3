/**
 * Supervisor Configuration
 * Loaded from environment variables; fail-closed on invalid values.
 */

import { z } from 'zod';
import { SupervisorConfigError } from './errors';
import { DEFAULT_HEALTH_PATH } from './health';

export const DEFAULT_BACKEND_ARGV = [
  'python',
  '-m',
  'uvicorn',
  'src.server.main:app',
  '--host',
  '{host}',
  '--port',
  '{port}'
];

const DurationSchema = z.coerce.number().int().positive();

const ArgvSchema = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    return value;
  }
}, z.array(z.string().min(1), { invalid_type_error: 'expected a JSON array of strings' }).min(1));

export const SupervisorEnvSchema = z.object({
  GANGWAY_BACKEND_ARGV: ArgvSchema.default(DEFAULT_BACKEND_ARGV),
  GANGWAY_BACKEND_CWD: z.string().min(1).optional(),
  GANGWAY_HEALTH_PATH: z.string().startsWith('/').default(DEFAULT_HEALTH_PATH),
  GANGWAY_READY_TIMEOUT_MS: DurationSchema.default(60_000),
  GANGWAY_ROUTER_READY_TIMEOUT_MS: DurationSchema.default(15_000),
  GANGWAY_POLL_INTERVAL_MS: DurationSchema.default(2_000),
  GANGWAY_PROBE_TIMEOUT_MS: DurationSchema.default(2_000),
  GANGWAY_STOP_TIMEOUT_MS: DurationSchema.default(10_000),
  GANGWAY_ROUTER: z.enum(['node', 'nginx']).default('node'),
  GANGWAY_NGINX_BIN: z.string().min(1).default('nginx'),
  GANGWAY_NGINX_CONF: z.string().min(1).default('/tmp/gangway/nginx.conf')
});

export type RouterKind = 'node' | 'nginx';

export interface SupervisorConfig {
  /** Backend command line; `{host}` and `{port}` are substituted at launch */
  backendArgv: string[];
  backendCwd?: string;
  healthPath: string;
  readyTimeoutMs: number;
  routerReadyTimeoutMs: number;
  pollIntervalMs: number;
  probeTimeoutMs: number;
  stopTimeoutMs: number;
  router: RouterKind;
  nginxBin: string;
  nginxConf: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function loadSupervisorConfig(env: NodeJS.ProcessEnv = process.env): SupervisorConfig {
  const parsed = SupervisorEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new SupervisorConfigError(`Invalid supervisor configuration: ${formatIssues(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    backendArgv: vars.GANGWAY_BACKEND_ARGV,
    backendCwd: vars.GANGWAY_BACKEND_CWD,
    healthPath: vars.GANGWAY_HEALTH_PATH,
    readyTimeoutMs: vars.GANGWAY_READY_TIMEOUT_MS,
    routerReadyTimeoutMs: vars.GANGWAY_ROUTER_READY_TIMEOUT_MS,
    pollIntervalMs: vars.GANGWAY_POLL_INTERVAL_MS,
    probeTimeoutMs: vars.GANGWAY_PROBE_TIMEOUT_MS,
    stopTimeoutMs: vars.GANGWAY_STOP_TIMEOUT_MS,
    router: vars.GANGWAY_ROUTER,
    nginxBin: vars.GANGWAY_NGINX_BIN,
    nginxConf: vars.GANGWAY_NGINX_CONF
  };
}

export function expandArgv(argv: readonly string[], listen: { host: string; port: number }): string[] {
  return argv.map(arg => arg.split('{host}').join(listen.host).split('{port}').join(String(listen.port)));
}
