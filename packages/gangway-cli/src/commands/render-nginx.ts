/**
 * render-nginx command - Render nginx.conf from the route table
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadRouterConfig, renderNginxConfig, routeTableFromConfig } from 'gangway-router';

export interface RenderNginxOptions {
  out?: string;
}

/**
 * Returns the rendered config; writes it to `out` when given, stdout otherwise.
 */
export async function renderNginxCommand(
  options: RenderNginxOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const config = loadRouterConfig(env);
  const rendered = renderNginxConfig(routeTableFromConfig(config), { listenPort: config.port });

  if (options.out) {
    await fs.promises.mkdir(path.dirname(options.out), { recursive: true });
    await fs.promises.writeFile(options.out, rendered, 'utf-8');
    console.log(`[NGINX] Wrote ${options.out}`);
  } else {
    process.stdout.write(rendered);
  }

  return rendered;
}
