import * as path from 'path';
import { loadRouterConfig, routeTableFromConfig } from '../config';
import { RouterConfigError } from '../errors';

describe('loadRouterConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadRouterConfig({}, '/app');

    expect(config).toEqual({
      port: 3737,
      host: '0.0.0.0',
      backend: { host: '127.0.0.1', port: 8000 },
      staticRoot: path.resolve('/app', 'ui/dist'),
      entryDocument: 'index.html',
      apiPrefix: 'preserve',
      apiTimeouts: { connectMs: 60_000, readMs: 300_000, sendMs: 300_000 },
      corsOrigin: undefined
    });
  });

  it('reads overrides', () => {
    const config = loadRouterConfig({
      GANGWAY_PORT: '8080',
      GANGWAY_BACKEND_PORT: '8181',
      GANGWAY_STATIC_ROOT: '/srv/ui',
      GANGWAY_API_PREFIX: 'strip',
      GANGWAY_API_READ_TIMEOUT_MS: '600000',
      GANGWAY_CORS_ORIGIN: 'http://localhost:5173'
    }, '/app');

    expect(config.port).toBe(8080);
    expect(config.backend.port).toBe(8181);
    expect(config.staticRoot).toBe('/srv/ui');
    expect(config.apiPrefix).toBe('strip');
    expect(config.apiTimeouts.readMs).toBe(600_000);
    expect(config.corsOrigin).toBe('http://localhost:5173');
  });

  it('fails closed on an invalid port', () => {
    expect(() => loadRouterConfig({ GANGWAY_PORT: 'seventy' })).toThrow(RouterConfigError);
    expect(() => loadRouterConfig({ GANGWAY_BACKEND_PORT: '70000' })).toThrow(/GANGWAY_BACKEND_PORT/);
  });

  it('fails closed on an unknown prefix mode', () => {
    expect(() => loadRouterConfig({ GANGWAY_API_PREFIX: 'both' })).toThrow(/GANGWAY_API_PREFIX/);
  });
});

describe('routeTableFromConfig', () => {
  it('builds the table from the loaded config', () => {
    const rules = routeTableFromConfig(loadRouterConfig({ GANGWAY_API_PREFIX: 'strip' }, '/app'));

    expect(rules.find(rule => rule.name === 'api')?.preservePrefix).toBe(false);
    expect(rules[rules.length - 1].target).toEqual({
      kind: 'static',
      root: path.resolve('/app', 'ui/dist'),
      entryDocument: 'index.html'
    });
  });
});
