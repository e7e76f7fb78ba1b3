/**
 * routes command - Print the route table, or the rule a path resolves to
 */

import { describeRule, loadRouterConfig, matchRoute, routeTableFromConfig } from 'gangway-router';

export interface RoutesOptions {
  match?: string;
}

export async function routesCommand(options: RoutesOptions, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const rules = routeTableFromConfig(loadRouterConfig(env));

  if (options.match !== undefined) {
    const rule = matchRoute(rules, options.match);
    console.log(rule ? describeRule(rule) : `No rule matches ${options.match}`);
    return;
  }

  console.log(`\n🧭 Routes (${rules.length}):\n`);
  for (const rule of rules) {
    console.log(`  ${describeRule(rule)}`);
  }
  console.log('');
}
