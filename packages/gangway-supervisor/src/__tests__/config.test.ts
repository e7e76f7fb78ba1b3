import { DEFAULT_BACKEND_ARGV, expandArgv, loadSupervisorConfig } from '../config';
import { SupervisorConfigError } from '../errors';

describe('loadSupervisorConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadSupervisorConfig({})).toEqual({
      backendArgv: DEFAULT_BACKEND_ARGV,
      backendCwd: undefined,
      healthPath: '/health',
      readyTimeoutMs: 60_000,
      routerReadyTimeoutMs: 15_000,
      pollIntervalMs: 2_000,
      probeTimeoutMs: 2_000,
      stopTimeoutMs: 10_000,
      router: 'node',
      nginxBin: 'nginx',
      nginxConf: '/tmp/gangway/nginx.conf'
    });
  });

  it('parses the backend command line as a JSON array', () => {
    const config = loadSupervisorConfig({
      GANGWAY_BACKEND_ARGV: '["node", "server.js", "--port", "{port}"]',
      GANGWAY_ROUTER: 'nginx',
      GANGWAY_READY_TIMEOUT_MS: '5000'
    });

    expect(config.backendArgv).toEqual(['node', 'server.js', '--port', '{port}']);
    expect(config.router).toBe('nginx');
    expect(config.readyTimeoutMs).toBe(5000);
  });

  it('fails closed on a malformed command line', () => {
    expect(() => loadSupervisorConfig({ GANGWAY_BACKEND_ARGV: 'python app.py' })).toThrow(SupervisorConfigError);
    expect(() => loadSupervisorConfig({ GANGWAY_BACKEND_ARGV: '[]' })).toThrow(/GANGWAY_BACKEND_ARGV/);
  });

  it('fails closed on an unknown router kind or a relative health path', () => {
    expect(() => loadSupervisorConfig({ GANGWAY_ROUTER: 'caddy' })).toThrow(/GANGWAY_ROUTER/);
    expect(() => loadSupervisorConfig({ GANGWAY_HEALTH_PATH: 'health' })).toThrow(/GANGWAY_HEALTH_PATH/);
  });
});

describe('expandArgv', () => {
  it('substitutes the listen address', () => {
    expect(expandArgv(DEFAULT_BACKEND_ARGV, { host: '127.0.0.1', port: 8000 })).toEqual([
      'python', '-m', 'uvicorn', 'src.server.main:app', '--host', '127.0.0.1', '--port', '8000'
    ]);
  });
});
