import { loadRouterConfig } from 'gangway-router';
import { loadSupervisorConfig } from 'gangway-supervisor';
import { buildBackendHandle, buildRouterHandle, buildTopology } from '../topology';

const options = { execPath: '/usr/bin/node', cliEntry: '/app/dist/gangway-cli/src/cli.js' };

describe('buildBackendHandle', () => {
  it('expands the backend command line with the backend address', () => {
    const handle = buildBackendHandle(
      loadRouterConfig({ GANGWAY_BACKEND_PORT: '8181' }, '/app'),
      loadSupervisorConfig({ GANGWAY_BACKEND_CWD: '/app/server', GANGWAY_POLL_INTERVAL_MS: '500' })
    );

    expect(handle).toEqual({
      name: 'backend',
      command: 'python',
      args: ['-m', 'uvicorn', 'src.server.main:app', '--host', '127.0.0.1', '--port', '8181'],
      cwd: '/app/server',
      listen: { host: '127.0.0.1', port: 8181 },
      health: { path: '/health', intervalMs: 500, probeTimeoutMs: 2000 }
    });
  });
});

describe('buildRouterHandle', () => {
  it('runs the Node router through the CLI by default', () => {
    const handle = buildRouterHandle(loadRouterConfig({}, '/app'), loadSupervisorConfig({}), options);

    expect(handle.command).toBe('/usr/bin/node');
    expect(handle.args).toEqual(['/app/dist/gangway-cli/src/cli.js', 'route']);
    expect(handle.listen).toEqual({ host: '0.0.0.0', port: 3737 });
    expect(handle.health?.path).toBe('/');
    expect(handle.preflight).toBeUndefined();
  });

  it('runs nginx in the foreground with a config test as preflight', () => {
    const handle = buildRouterHandle(
      loadRouterConfig({ GANGWAY_PORT: '8080' }, '/app'),
      loadSupervisorConfig({ GANGWAY_ROUTER: 'nginx', GANGWAY_NGINX_CONF: '/etc/gangway/nginx.conf' }),
      options
    );

    expect(handle.name).toBe('nginx');
    expect(handle.command).toBe('nginx');
    expect(handle.args).toEqual(['-c', '/etc/gangway/nginx.conf', '-g', 'daemon off;']);
    expect(handle.preflight).toEqual({ command: 'nginx', args: ['-t', '-c', '/etc/gangway/nginx.conf'] });
    expect(handle.listen.port).toBe(8080);
  });
});

describe('buildTopology', () => {
  it('names the backend and router differently', () => {
    const topology = buildTopology(loadRouterConfig({}, '/app'), loadSupervisorConfig({}), options);

    expect(topology.backend.name).not.toBe(topology.router.name);
  });
});
