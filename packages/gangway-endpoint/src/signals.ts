import { z } from 'zod';
import { EndpointSignals, LocationLike } from './types';

/**
 * The one place that reads ambient state (build env, browser location).
 * Accepts Vite's `import.meta.env` as well as a string-valued `process.env`.
 * Malformed values are dropped rather than thrown: resolution never fails.
 */

const FlagSchema = z
  .union([z.boolean(), z.string()])
  .optional()
  .catch(undefined)
  .transform((value) => value === true || value === 'true' || value === '1');

const OptionalStringSchema = z.string().optional().catch(undefined);

export const EndpointEnvSchema = z.object({
  PROD: FlagSchema,
  MODE: OptionalStringSchema,
  NODE_ENV: OptionalStringSchema,
  VITE_API_URL: OptionalStringSchema
});

export type EndpointEnv = z.infer<typeof EndpointEnvSchema>;

export function isProductionEnv(env: EndpointEnv): boolean {
  return env.PROD || env.MODE === 'production' || env.NODE_ENV === 'production';
}

export function readEndpointSignals(env: Record<string, unknown>, location: LocationLike): EndpointSignals {
  const parsed = EndpointEnvSchema.parse(env);
  const override = parsed.VITE_API_URL;

  return {
    production: isProductionEnv(parsed),
    apiUrlOverride: override && override.trim() ? override : undefined,
    location: {
      protocol: location.protocol,
      hostname: location.hostname,
      port: location.port
    }
  };
}

/** Build a location from a URL string, for callers outside a browser */
export function locationFromUrl(url: string): LocationLike {
  const parsed = new URL(url);
  return {
    protocol: parsed.protocol,
    hostname: parsed.hostname,
    port: parsed.port
  };
}
