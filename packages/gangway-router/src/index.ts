/**
 * gangway-router
 * Declarative routing for the single exposed port
 */

export * from './types';
export { RouteTableError, RouteTableErrorCode, RouterConfigError } from './errors';
export {
  DEFAULT_ENTRY_DOCUMENT,
  DEFAULT_PASSTHROUGH_TIMEOUTS,
  DEFAULT_API_TIMEOUTS,
  RouteTableOptions,
  buildRouteTable,
  prefixMatches,
  matchRoute,
  validateRouteTable,
  checkEndpointConsistency,
  describeRule
} from './table';
export { NginxRenderOptions, renderNginxConfig } from './nginx';
export { RouterEnvSchema, RouterConfig, formatIssues, loadRouterConfig, routeTableFromConfig } from './config';
export {
  RouterServer,
  RouterServerConfig,
  ClientInfo,
  ProxyTransport,
  proxyTransport,
  withForwardingHeaders,
  statusForUpstreamFailure
} from './server';
