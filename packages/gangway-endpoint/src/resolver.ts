import {
  DeploymentMode,
  EndpointConfig,
  EndpointLog,
  EndpointResolution,
  EndpointSignals,
  EndpointSource
} from './types';

/**
 * Endpoint resolution: decides where the UI reaches the API.
 *
 * Priority (first match wins):
 * 1. Production build   → "" (same-origin, the proxy owns /api)
 * 2. Explicit override  → the override, verbatim
 * 3. Development        → browser protocol + hostname, browser port or DEFAULT_APP_PORT
 */

export const DEFAULT_APP_PORT = 3737;
export const API_PATH = '/api';

const defaultLog: EndpointLog = (message) => console.info(message);

export function deriveBasePath(baseUrl: string): string {
  return `${baseUrl || ''}${API_PATH}`;
}

function makeConfig(baseUrl: string): EndpointConfig {
  return Object.freeze({ baseUrl, basePath: deriveBasePath(baseUrl) });
}

function resolution(mode: DeploymentMode, source: EndpointSource, baseUrl: string): EndpointResolution {
  return Object.freeze({ mode, source, config: makeConfig(baseUrl) });
}

export function resolveEndpoint(signals: EndpointSignals, log: EndpointLog = defaultLog): EndpointResolution {
  if (signals.production) {
    log('[gangway] Production mode - using same-origin API');
    return resolution(DeploymentMode.PRODUCTION, 'same-origin', '');
  }

  // Override is never consulted in production
  if (signals.apiUrlOverride) {
    log(`[gangway] Development mode - using API override: ${signals.apiUrlOverride}`);
    return resolution(DeploymentMode.DEVELOPMENT, 'override', signals.apiUrlOverride);
  }

  const { protocol, hostname } = signals.location;
  const port = signals.location.port || String(DEFAULT_APP_PORT);

  log(`[gangway] Development mode - using port: ${port}`);
  return resolution(DeploymentMode.DEVELOPMENT, 'synthesized', `${protocol}//${hostname}:${port}`);
}

/**
 * Join an endpoint path onto the config's basePath.
 * `apiUrl(config, '/projects')` → `/api/projects` (same-origin)
 */
export function apiUrl(config: EndpointConfig, path: string): string {
  if (!path) {
    return config.basePath;
  }
  return path.startsWith('/') ? `${config.basePath}${path}` : `${config.basePath}/${path}`;
}

/**
 * Memoise one resolution per process. Recomputing means building a new loader.
 */
export function createEndpointLoader(
  readSignals: () => EndpointSignals,
  log?: EndpointLog
): () => EndpointResolution {
  let cached: EndpointResolution | null = null;

  return () => {
    if (!cached) {
      cached = resolveEndpoint(readSignals(), log);
    }
    return cached;
  };
}
