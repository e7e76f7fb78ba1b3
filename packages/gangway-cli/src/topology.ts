/**
 * Process topology
 * Turns the router and supervisor configuration into the two handles the
 * Supervisor runs: the backend and the router (Node or nginx).
 */

import * as path from 'path';
import { RouterConfig } from 'gangway-router';
import { expandArgv, ProcessHandle, SupervisorConfig } from 'gangway-supervisor';

export interface TopologyOptions {
  /** Node binary used to run the Node router */
  execPath: string;
  /** Script that implements the `route` command */
  cliEntry: string;
}

export interface Topology {
  backend: ProcessHandle;
  router: ProcessHandle;
}

export function buildBackendHandle(router: RouterConfig, supervisor: SupervisorConfig): ProcessHandle {
  const [command, ...args] = expandArgv(supervisor.backendArgv, router.backend);

  return {
    name: 'backend',
    command,
    args,
    cwd: supervisor.backendCwd,
    listen: router.backend,
    health: {
      path: supervisor.healthPath,
      intervalMs: supervisor.pollIntervalMs,
      probeTimeoutMs: supervisor.probeTimeoutMs
    }
  };
}

export function buildRouterHandle(
  router: RouterConfig,
  supervisor: SupervisorConfig,
  options: TopologyOptions
): ProcessHandle {
  const listen = { host: router.host, port: router.port };
  const health = { path: '/', intervalMs: supervisor.pollIntervalMs, probeTimeoutMs: supervisor.probeTimeoutMs };

  if (supervisor.router === 'nginx') {
    return {
      name: 'nginx',
      command: supervisor.nginxBin,
      args: ['-c', supervisor.nginxConf, '-g', 'daemon off;'],
      cwd: path.dirname(supervisor.nginxConf),
      listen,
      health,
      preflight: { command: supervisor.nginxBin, args: ['-t', '-c', supervisor.nginxConf] }
    };
  }

  return {
    name: 'router',
    command: options.execPath,
    args: [options.cliEntry, 'route'],
    listen,
    health
  };
}

export function buildTopology(router: RouterConfig, supervisor: SupervisorConfig, options: TopologyOptions): Topology {
  return {
    backend: buildBackendHandle(router, supervisor),
    router: buildRouterHandle(router, supervisor, options)
  };
}
