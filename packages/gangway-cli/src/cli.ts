#!/usr/bin/env node
/**
 * gangway CLI
 * Commands: supervise, route, render-nginx, routes, endpoint
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { superviseCommand } from './commands/supervise';
import { routeCommand } from './commands/route';
import { renderNginxCommand } from './commands/render-nginx';
import { routesCommand } from './commands/routes';
import { endpointCommand } from './commands/endpoint';

function fail(error: unknown): never {
  console.error(chalk.red(`[ERROR] ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}

const program = new Command();

program
  .name('gangway')
  .description('Single-port gateway: UI bundle and API backend behind one router')
  .version('0.1.0');

// gangway supervise
program
  .command('supervise')
  .description('Start the backend, wait for it, then run the router (container entrypoint)')
  .option('--dry-run', 'Print the process handles and exit')
  .action(async (options: { dryRun?: boolean }) => {
    try {
      const { exitCode } = await superviseCommand({ cliEntry: __filename, dryRun: options.dryRun });
      process.exit(exitCode);
    } catch (error) {
      fail(error);
    }
  });

// gangway route
program
  .command('route')
  .description('Run the Node router in the foreground')
  .action(async () => {
    try {
      await routeCommand();
    } catch (error) {
      fail(error);
    }
  });

// gangway render-nginx
program
  .command('render-nginx')
  .description('Render nginx.conf from the route table')
  .option('--out <file>', 'Write to a file instead of stdout')
  .action(async (options: { out?: string }) => {
    try {
      await renderNginxCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// gangway routes
program
  .command('routes')
  .description('Print the route table')
  .option('--match <path>', 'Show only the rule a request path resolves to')
  .action(async (options: { match?: string }) => {
    try {
      await routesCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// gangway endpoint
program
  .command('endpoint')
  .description('Print the API endpoint the UI bundle would resolve to')
  .option('--location <url>', 'Page URL the bundle is served from')
  .action(async (options: { location?: string }) => {
    try {
      await endpointCommand(options);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
