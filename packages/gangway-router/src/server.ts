/**
 * Node Router
 * Serves a route table on the exposed port with Fastify: backend rules through
 * @fastify/http-proxy, the fallback through @fastify/static with SPA fallback.
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import proxy from '@fastify/http-proxy';
import { IncomingHttpHeaders } from 'http';
import { validateRouteTable, DEFAULT_PASSTHROUGH_TIMEOUTS } from './table';
import { BackendTarget, ProxyTimeouts, RouteRule, StaticTarget } from './types';

export interface RouterServerConfig {
  port: number;
  host: string;
  rules: RouteRule[];
  corsOrigin?: string;
  logger?: boolean;
}

export interface ClientInfo {
  ip: string;
  protocol: string;
  host?: string;
}

/**
 * Forwarding headers as a reverse proxy sets them.
 * An incoming X-Forwarded-For chain is extended, not replaced.
 */
export function withForwardingHeaders<H extends IncomingHttpHeaders>(headers: H, client: ClientInfo): H {
  const prior = headers['x-forwarded-for'];
  const chain = Array.isArray(prior) ? prior.join(', ') : prior;

  return {
    ...headers,
    ...(client.host ? { host: client.host } : {}),
    'x-real-ip': client.ip,
    'x-forwarded-for': chain ? `${chain}, ${client.ip}` : client.ip,
    'x-forwarded-proto': client.protocol
  };
}

function errorOf(failure: unknown): unknown {
  if (failure && typeof failure === 'object' && 'error' in failure) {
    return failure.error;
  }
  return failure;
}

/**
 * 504 for upstream timeouts, 502 for everything else (refused, reset, DNS).
 */
export function statusForUpstreamFailure(failure: unknown): 502 | 504 {
  const error = errorOf(failure);
  if (!(error instanceof Error)) {
    return 502;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  if (code.includes('TIMEOUT') || error.name.includes('Timeout') || /timed? ?out/i.test(error.message)) {
    return 504;
  }
  return 502;
}

export interface ProxyTransport {
  connect: { timeout: number };
  headersTimeout: number;
  bodyTimeout: number;
}

/**
 * Upstream pool options for a rule's timeouts.
 * connectMs bounds the TCP connect, readMs the wait for response headers,
 * and the larger of readMs/sendMs the idle gap between body chunks.
 */
export function proxyTransport(timeouts: ProxyTimeouts): ProxyTransport {
  return {
    connect: { timeout: timeouts.connectMs },
    headersTimeout: timeouts.readMs,
    bodyTimeout: Math.max(timeouts.readMs, timeouts.sendMs)
  };
}

export class RouterServer {
  private app: FastifyInstance;
  private config: Required<Omit<RouterServerConfig, 'corsOrigin'>> & Pick<RouterServerConfig, 'corsOrigin'>;
  private registered = false;

  constructor(config: RouterServerConfig) {
    validateRouteTable(config.rules);

    this.config = { ...config, logger: config.logger ?? true };
    this.app = Fastify({ logger: this.config.logger });
  }

  /**
   * Register every rule and wait for the plugin tree to load.
   */
  async build(): Promise<FastifyInstance> {
    if (!this.registered) {
      this.registered = true;

      if (this.config.corsOrigin) {
        const origins = this.config.corsOrigin.split(',').map(origin => origin.trim());
        await this.app.register(cors, { origin: origins.length === 1 ? origins[0] : origins });
      }

      for (const rule of this.config.rules) {
        if (rule.target.kind === 'backend') {
          await this.registerBackendRule(rule, rule.target);
        } else {
          await this.registerStaticRule(rule.target);
        }
      }
    }

    await this.app.ready();
    return this.app;
  }

  async start(): Promise<void> {
    await this.build();
    await this.app.listen({ port: this.config.port, host: this.config.host });
    console.log(`[ROUTER] Listening on http://${this.config.host}:${this.config.port}`);
  }

  async stop(): Promise<void> {
    await this.app.close();
    console.log('[ROUTER] Stopped');
  }

  getApp(): FastifyInstance {
    return this.app;
  }

  private async registerBackendRule(rule: RouteRule, target: BackendTarget): Promise<void> {
    const timeouts = rule.timeouts ?? DEFAULT_PASSTHROUGH_TIMEOUTS;

    await this.app.register(proxy, {
      upstream: `http://${target.upstream.host}:${target.upstream.port}`,
      prefix: rule.externalPathPrefix,
      rewritePrefix: rule.preservePrefix ? rule.externalPathPrefix : '',
      undici: proxyTransport(timeouts),
      replyOptions: {
        rewriteRequestHeaders: (request, headers) =>
          withForwardingHeaders(headers, {
            ip: request.ip,
            protocol: request.protocol,
            host: request.headers.host
          }),
        onError: (reply, failure) => {
          const status = statusForUpstreamFailure(failure);
          reply.code(status).send({
            statusCode: status,
            error: status === 504 ? 'Gateway Timeout' : 'Bad Gateway',
            message: `Upstream for rule "${rule.name}" did not respond`
          });
        }
      }
    });
  }

  private async registerStaticRule(target: StaticTarget): Promise<void> {
    await this.app.register(fastifyStatic, {
      root: target.root,
      prefix: '/',
      index: [target.entryDocument]
    });

    // No file behind the path: let the UI's client-side router handle it
    this.app.setNotFoundHandler((request, reply) => {
      if (request.method === 'GET' || request.method === 'HEAD') {
        return reply.code(200).sendFile(target.entryDocument);
      }
      return reply.code(404).send({ statusCode: 404, error: 'Not Found', message: `${request.method} ${request.url}` });
    });
  }
}
