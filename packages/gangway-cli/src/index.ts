/**
 * gangway-cli
 * Command implementations behind the `gangway` binary
 */

export * from './topology';
export { SuperviseOptions, superviseCommand } from './commands/supervise';
export { routeCommand } from './commands/route';
export { RenderNginxOptions, renderNginxCommand } from './commands/render-nginx';
export { RoutesOptions, routesCommand } from './commands/routes';
export { EndpointOptions, endpointCommand } from './commands/endpoint';
