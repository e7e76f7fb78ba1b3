/**
 * Route Table
 * Default rule set, first-match lookup and structural validation.
 *
 * Priority order:
 * 1. /health, /docs → backend (prefix preserved)
 * 2. /api           → backend (prefix preserved unless explicitly stripped; streamed)
 * 3. /              → static UI root, entry document for unknown paths
 */

import { API_PATH, EndpointConfig } from 'gangway-endpoint';
import { RouteTableError } from './errors';
import {
  ApiPrefixMode,
  FALLBACK_PREFIX,
  ProxyTimeouts,
  RouteRule,
  UpstreamAddress
} from './types';

export const DEFAULT_ENTRY_DOCUMENT = 'index.html';

export const DEFAULT_PASSTHROUGH_TIMEOUTS: ProxyTimeouts = {
  connectMs: 60_000,
  readMs: 60_000,
  sendMs: 60_000
};

export const DEFAULT_API_TIMEOUTS: ProxyTimeouts = {
  connectMs: 60_000,
  readMs: 300_000,
  sendMs: 300_000
};

export interface RouteTableOptions {
  backend: UpstreamAddress;
  staticRoot: string;
  entryDocument?: string;
  apiPrefix?: ApiPrefixMode;
  apiTimeouts?: Partial<ProxyTimeouts>;
}

export function buildRouteTable(options: RouteTableOptions): RouteRule[] {
  const backend = { kind: 'backend' as const, upstream: { ...options.backend } };

  const passthrough = (name: string, prefix: string): RouteRule => ({
    name,
    externalPathPrefix: prefix,
    target: backend,
    preservePrefix: true,
    streaming: false,
    timeouts: { ...DEFAULT_PASSTHROUGH_TIMEOUTS }
  });

  return [
    passthrough('health', '/health'),
    passthrough('docs', '/docs'),
    {
      name: 'api',
      externalPathPrefix: API_PATH,
      target: backend,
      preservePrefix: (options.apiPrefix ?? 'preserve') === 'preserve',
      streaming: true,
      timeouts: { ...DEFAULT_API_TIMEOUTS, ...options.apiTimeouts }
    },
    {
      name: 'spa',
      externalPathPrefix: FALLBACK_PREFIX,
      target: {
        kind: 'static',
        root: options.staticRoot,
        entryDocument: options.entryDocument ?? DEFAULT_ENTRY_DOCUMENT
      },
      preservePrefix: true,
      streaming: false
    }
  ];
}

function pathOf(url: string): string {
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

export function prefixMatches(prefix: string, path: string): boolean {
  if (prefix === FALLBACK_PREFIX) {
    return true;
  }
  return path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * First rule whose prefix covers the request path (query string ignored).
 * A validated table always yields a rule.
 */
export function matchRoute(rules: readonly RouteRule[], url: string): RouteRule | null {
  const path = pathOf(url);
  return rules.find(rule => prefixMatches(rule.externalPathPrefix, path)) ?? null;
}

/**
 * Reject tables where some path would match no rule, or a rule could never match.
 */
export function validateRouteTable(rules: readonly RouteRule[]): void {
  if (rules.length === 0) {
    throw new RouteTableError('Route table has no rules', 'ROUTE_TABLE_EMPTY');
  }

  const seen = new Set<string>();
  for (const rule of rules) {
    const prefix = rule.externalPathPrefix;
    const trailingSlash = prefix !== FALLBACK_PREFIX && prefix.endsWith('/');
    if (!prefix.startsWith('/') || trailingSlash) {
      throw new RouteTableError(
        `Rule "${rule.name}" has invalid prefix "${prefix}" (must start with "/" and not end with "/")`,
        'ROUTE_PREFIX_INVALID'
      );
    }
    if (seen.has(prefix)) {
      throw new RouteTableError(`Prefix "${prefix}" is used by more than one rule`, 'ROUTE_PREFIX_DUPLICATE');
    }
    seen.add(prefix);
  }

  const fallbackIndex = rules.findIndex(rule => rule.externalPathPrefix === FALLBACK_PREFIX);
  if (fallbackIndex === -1) {
    throw new RouteTableError('Route table has no "/" fallback rule', 'ROUTE_FALLBACK_MISSING');
  }
  if (fallbackIndex !== rules.length - 1) {
    throw new RouteTableError(
      `Fallback rule "${rules[fallbackIndex].name}" must be last`,
      'ROUTE_FALLBACK_NOT_LAST'
    );
  }
  if (rules[fallbackIndex].target.kind !== 'static') {
    throw new RouteTableError(
      `Fallback rule "${rules[fallbackIndex].name}" must serve the static root`,
      'ROUTE_FALLBACK_NOT_STATIC'
    );
  }

  for (let i = 1; i < fallbackIndex; i++) {
    for (let j = 0; j < i; j++) {
      if (prefixMatches(rules[j].externalPathPrefix, rules[i].externalPathPrefix)) {
        throw new RouteTableError(
          `Rule "${rules[i].name}" is shadowed by earlier rule "${rules[j].name}"`,
          'ROUTE_RULE_SHADOWED'
        );
      }
    }
  }
}

/**
 * Check the UI's endpoint against the table it will be served through.
 * Same-origin addressing only works if /api reaches the backend.
 */
export function checkEndpointConsistency(endpoint: EndpointConfig, rules: readonly RouteRule[]): string[] {
  if (endpoint.baseUrl) {
    return [];
  }

  const issues: string[] = [];
  for (const probe of [endpoint.basePath, `${endpoint.basePath}/`]) {
    const rule = matchRoute(rules, probe);
    if (!rule || rule.target.kind !== 'backend') {
      issues.push(
        `Same-origin API path ${probe} is served by ${rule ? `rule "${rule.name}"` : 'no rule'}, not the backend`
      );
    }
  }
  return issues;
}

export function describeRule(rule: RouteRule): string {
  const target = rule.target.kind === 'backend'
    ? `backend http://${rule.target.upstream.host}:${rule.target.upstream.port}`
    : `static ${rule.target.root} (fallback ${rule.target.entryDocument})`;
  const flags = [
    rule.target.kind === 'backend' ? (rule.preservePrefix ? 'prefix kept' : 'prefix stripped') : null,
    rule.streaming ? 'streaming' : null
  ].filter((flag): flag is string => flag !== null);

  return `${rule.name.padEnd(8)} ${rule.externalPathPrefix.padEnd(10)} → ${target}${flags.length ? ` [${flags.join(', ')}]` : ''}`;
}
