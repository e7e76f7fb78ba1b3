/**
 * route command - Run the Node router in the foreground
 */

import chalk from 'chalk';
import { loadRouterConfig, RouterServer, routeTableFromConfig } from 'gangway-router';

export async function routeCommand(env: NodeJS.ProcessEnv = process.env): Promise<RouterServer> {
  const config = loadRouterConfig(env);
  const server = new RouterServer({
    port: config.port,
    host: config.host,
    rules: routeTableFromConfig(config),
    corsOrigin: config.corsOrigin
  });

  await server.start();

  console.log('');
  console.log(chalk.bold.green('Router Ready'));
  console.log(chalk.gray(`  Listening:  http://${config.host}:${config.port}`));
  console.log(chalk.gray(`  Backend:    http://${config.backend.host}:${config.backend.port}`));
  console.log(chalk.gray(`  UI:         ${config.staticRoot}`));
  console.log('');

  const stop = (signal: NodeJS.Signals) => {
    console.log(chalk.yellow(`[ROUTER] Received ${signal}, shutting down...`));
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(chalk.red(`[ERROR] ${error instanceof Error ? error.message : String(error)}`));
        process.exit(1);
      }
    );
  };
  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);

  return server;
}
