/**
 * endpoint command - Show what the UI bundle's endpoint resolver would pick
 */

import {
  DEFAULT_APP_PORT,
  EndpointResolution,
  locationFromUrl,
  readEndpointSignals,
  resolveEndpoint
} from 'gangway-endpoint';

export interface EndpointOptions {
  /** Page URL the bundle is assumed to be served from */
  location?: string;
}

export async function endpointCommand(
  options: EndpointOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<EndpointResolution> {
  const location = locationFromUrl(options.location ?? `http://localhost:${DEFAULT_APP_PORT}/`);
  const resolution = resolveEndpoint(readEndpointSignals(env, location));

  console.log(JSON.stringify(resolution, null, 2));
  return resolution;
}
