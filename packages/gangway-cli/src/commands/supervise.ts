/**
 * supervise command - Container entrypoint
 * Backend first, then the router; resolves with the router's exit code.
 */

import * as fs from 'fs';
import * as path from 'path';
import { locationFromUrl, resolveEndpoint } from 'gangway-endpoint';
import {
  checkEndpointConsistency,
  loadRouterConfig,
  renderNginxConfig,
  routeTableFromConfig
} from 'gangway-router';
import { consoleLogger, loadSupervisorConfig, Logger, Supervisor } from 'gangway-supervisor';
import { buildTopology } from '../topology';

export interface SuperviseOptions {
  env?: NodeJS.ProcessEnv;
  /** Script that implements the `route` command */
  cliEntry: string;
  execPath?: string;
  logger?: Logger;
  /** Print the process handles instead of running them */
  dryRun?: boolean;
}

export async function superviseCommand(options: SuperviseOptions): Promise<{ supervisor: Supervisor; exitCode: number }> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? consoleLogger();
  const routerConfig = loadRouterConfig(env);
  const supervisorConfig = loadSupervisorConfig(env);
  const rules = routeTableFromConfig(routerConfig);

  // The production bundle addresses the API same-origin; the table must route it
  const production = resolveEndpoint(
    { production: true, location: locationFromUrl(`http://localhost:${routerConfig.port}/`) },
    () => undefined
  );
  for (const issue of checkEndpointConsistency(production.config, rules)) {
    logger.warn(issue);
  }

  if (supervisorConfig.router === 'nginx') {
    const rendered = renderNginxConfig(rules, { listenPort: routerConfig.port });
    await fs.promises.mkdir(path.dirname(supervisorConfig.nginxConf), { recursive: true });
    await fs.promises.writeFile(supervisorConfig.nginxConf, rendered, 'utf-8');
    logger.info(`Rendered ${supervisorConfig.nginxConf}`);
  }

  const topology = buildTopology(routerConfig, supervisorConfig, {
    execPath: options.execPath ?? process.execPath,
    cliEntry: options.cliEntry
  });

  const supervisor = new Supervisor({
    ...topology,
    readyTimeoutMs: supervisorConfig.readyTimeoutMs,
    routerReadyTimeoutMs: supervisorConfig.routerReadyTimeoutMs,
    stopTimeoutMs: supervisorConfig.stopTimeoutMs,
    logger
  });

  if (options.dryRun) {
    for (const handle of [topology.backend, topology.router]) {
      const preflight = handle.preflight ? ` (preflight: ${[handle.preflight.command, ...handle.preflight.args].join(' ')})` : '';
      logger.info(`${handle.name}: ${[handle.command, ...handle.args].join(' ')}${preflight}`);
    }
    return { supervisor, exitCode: 0 };
  }

  return { supervisor, exitCode: await supervisor.run() };
}
