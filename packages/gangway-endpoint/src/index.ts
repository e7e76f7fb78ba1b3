/**
 * gangway-endpoint
 * API base URL resolution for the UI bundle
 */

export * from './types';
export {
  DEFAULT_APP_PORT,
  API_PATH,
  deriveBasePath,
  resolveEndpoint,
  apiUrl,
  createEndpointLoader
} from './resolver';
export {
  EndpointEnvSchema,
  EndpointEnv,
  isProductionEnv,
  readEndpointSignals,
  locationFromUrl
} from './signals';
