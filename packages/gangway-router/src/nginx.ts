/**
 * nginx rendering
 * Turns a validated route table into a complete nginx.conf.
 *
 * Backend rules become regex locations so they are tried in table order and
 * match on segment boundaries; the fallback becomes `location /` with try_files.
 */

import { validateRouteTable } from './table';
import { BackendTarget, FALLBACK_PREFIX, ProxyTimeouts, RouteRule, StaticTarget } from './types';

export interface NginxRenderOptions {
  listenPort: number;
  serverName?: string;
  clientMaxBodySize?: string;
  mimeTypesPath?: string;
  pidPath?: string;
}

const INDENT = '    ';

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function seconds(ms: number): string {
  return `${Math.max(1, Math.ceil(ms / 1000))}s`;
}

function block(header: string, lines: string[], depth: number): string {
  const pad = INDENT.repeat(depth);
  const body = lines.map(line => (line ? `${pad}${INDENT}${line}` : '')).join('\n');
  return `${pad}${header} {\n${body}\n${pad}}`;
}

function timeoutDirectives(timeouts: ProxyTimeouts): string[] {
  return [
    `proxy_connect_timeout ${seconds(timeouts.connectMs)};`,
    `proxy_read_timeout ${seconds(timeouts.readMs)};`,
    `proxy_send_timeout ${seconds(timeouts.sendMs)};`
  ];
}

function backendLocation(rule: RouteRule, target: BackendTarget): string {
  const prefix = escapeRegex(rule.externalPathPrefix);
  const lines: string[] = [];

  if (!rule.preservePrefix) {
    lines.push(`rewrite ^${prefix}/?(.*)$ /$1 break;`);
  }

  lines.push(
    `proxy_pass http://${target.upstream.host}:${target.upstream.port};`,
    'proxy_http_version 1.1;',
    'proxy_set_header Host $host;',
    'proxy_set_header X-Real-IP $remote_addr;',
    'proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    'proxy_set_header X-Forwarded-Proto $scheme;'
  );

  if (rule.streaming) {
    lines.push('proxy_buffering off;', 'proxy_cache off;');
  }
  if (rule.timeouts) {
    lines.push(...timeoutDirectives(rule.timeouts));
  }

  return `${INDENT.repeat(2)}# ${rule.name}\n${block(`location ~ ^${prefix}(/|$)`, lines, 2)}`;
}

function staticLocation(rule: RouteRule, target: StaticTarget): string {
  return `${INDENT.repeat(2)}# ${rule.name}\n${block(`location ${FALLBACK_PREFIX}`, [
    `root ${target.root};`,
    `index ${target.entryDocument};`,
    `try_files $uri $uri/ /${target.entryDocument};`
  ], 2)}`;
}

export function renderNginxConfig(rules: readonly RouteRule[], options: NginxRenderOptions): string {
  validateRouteTable(rules);

  const locations = rules.map(rule =>
    rule.target.kind === 'backend'
      ? backendLocation(rule, rule.target)
      : staticLocation(rule, rule.target)
  );

  const server = [
    `listen ${options.listenPort};`,
    `server_name ${options.serverName ?? '_'};`,
    '',
    locations.join('\n\n')
  ];

  // Locations are already indented; only the directives need padding
  const serverBody = server
    .map(line => (line.startsWith(INDENT.repeat(2)) || !line ? line : `${INDENT.repeat(2)}${line}`))
    .join('\n');

  return [
    'worker_processes auto;',
    `pid ${options.pidPath ?? '/tmp/nginx.pid'};`,
    'error_log /dev/stderr info;',
    '',
    block('events', ['worker_connections 1024;'], 0),
    '',
    'http {',
    `${INDENT}include ${options.mimeTypesPath ?? '/etc/nginx/mime.types'};`,
    `${INDENT}default_type application/octet-stream;`,
    `${INDENT}access_log /dev/stdout;`,
    `${INDENT}sendfile on;`,
    `${INDENT}client_max_body_size ${options.clientMaxBodySize ?? '50m'};`,
    '',
    `${INDENT}server {`,
    serverBody,
    `${INDENT}}`,
    '}',
    ''
  ].join('\n');
}
