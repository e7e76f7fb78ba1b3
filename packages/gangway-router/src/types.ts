/**
 * Route table model
 * An ordered list of rules dispatching the single exposed port.
 */

export interface UpstreamAddress {
  host: string;
  port: number;
}

export interface StaticTarget {
  kind: 'static';
  /** Absolute path of the UI bundle */
  root: string;
  /** Served for any path with no file behind it */
  entryDocument: string;
}

export interface BackendTarget {
  kind: 'backend';
  upstream: UpstreamAddress;
}

export type RouteTarget = StaticTarget | BackendTarget;

export interface ProxyTimeouts {
  connectMs: number;
  readMs: number;
  sendMs: number;
}

export interface RouteRule {
  name: string;
  /** Matched on segment boundaries; "/" is the fallback and matches everything */
  externalPathPrefix: string;
  target: RouteTarget;
  /** Forward `/api/x` as `/api/x` (true) or `/x` (false) */
  preservePrefix: boolean;
  /** Stream responses through without buffering */
  streaming: boolean;
  timeouts?: ProxyTimeouts;
}

export type ApiPrefixMode = 'preserve' | 'strip';

export const FALLBACK_PREFIX = '/';
