/**
 * Endpoint Resolver types
 */

export enum DeploymentMode {
  PRODUCTION = 'production',
  DEVELOPMENT = 'development'
}

/**
 * Where the UI sends API calls.
 * An empty baseUrl means same-origin relative addressing.
 */
export interface EndpointConfig {
  readonly baseUrl: string;
  readonly basePath: string;
}

/** Which resolution step produced the config */
export type EndpointSource = 'same-origin' | 'override' | 'synthesized';

export interface EndpointResolution {
  readonly mode: DeploymentMode;
  readonly source: EndpointSource;
  readonly config: EndpointConfig;
}

/** The subset of `window.location` the resolver reads */
export interface LocationLike {
  protocol: string;
  hostname: string;
  port: string;
}

/**
 * Everything the resolver needs, read once at the boundary.
 */
export interface EndpointSignals {
  production: boolean;
  apiUrlOverride?: string;
  location: LocationLike;
}

export type EndpointLog = (message: string) => void;
