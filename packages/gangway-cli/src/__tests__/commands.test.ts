import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { endpointCommand } from '../commands/endpoint';
import { renderNginxCommand } from '../commands/render-nginx';
import { routesCommand } from '../commands/routes';
import { superviseCommand } from '../commands/supervise';

describe('CLI commands', () => {
  let log: jest.SpyInstance;
  let tempDir: string;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gangway-cli-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('routes', () => {
    it('prints the rule a path resolves to', async () => {
      await routesCommand({ match: '/api/widgets?page=2' }, {});

      expect(log).toHaveBeenCalledWith('api      /api       → backend http://127.0.0.1:8000 [prefix kept, streaming]');
    });

    it('resolves unknown paths to the static fallback', async () => {
      await routesCommand({ match: '/apix' }, { GANGWAY_STATIC_ROOT: '/srv/ui' });

      expect(log).toHaveBeenCalledWith('spa      /          → static /srv/ui (fallback index.html)');
    });

    it('lists every rule', async () => {
      await routesCommand({}, {});

      expect(log).toHaveBeenCalledWith('\n🧭 Routes (4):\n');
    });
  });

  describe('render-nginx', () => {
    it('writes the rendered config to --out', async () => {
      const out = path.join(tempDir, 'conf', 'nginx.conf');

      const rendered = await renderNginxCommand({ out }, { GANGWAY_PORT: '8080' });

      expect(fs.readFileSync(out, 'utf-8')).toBe(rendered);
      expect(rendered).toContain('listen 8080;');
      expect(rendered).toContain('location ~ ^/api(/|$)');
      expect(log).toHaveBeenCalledWith(`[NGINX] Wrote ${out}`);
    });
  });

  describe('endpoint', () => {
    it('synthesizes the development endpoint from the page location', async () => {
      const resolution = await endpointCommand({ location: 'http://devbox:5173/' }, {});

      expect(resolution.source).toBe('synthesized');
      expect(resolution.config).toEqual({ baseUrl: 'http://devbox:5173', basePath: 'http://devbox:5173/api' });
    });

    it('uses same-origin addressing in production', async () => {
      const resolution = await endpointCommand({}, { NODE_ENV: 'production', VITE_API_URL: 'http://elsewhere:9000' });

      expect(resolution.config).toEqual({ baseUrl: '', basePath: '/api' });
    });
  });

  describe('supervise --dry-run', () => {
    it('prints both process handles without launching them', async () => {
      const logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      const conf = path.join(tempDir, 'nginx.conf');

      const { exitCode, supervisor } = await superviseCommand({
        env: { GANGWAY_ROUTER: 'nginx', GANGWAY_NGINX_CONF: conf },
        cliEntry: '/app/cli.js',
        logger,
        dryRun: true
      });

      expect(exitCode).toBe(0);
      expect(fs.existsSync(conf)).toBe(true);
      expect(logger.info.mock.calls.map(call => call[0])).toEqual([
        `Rendered ${conf}`,
        'backend: python -m uvicorn src.server.main:app --host 127.0.0.1 --port 8000',
        `nginx: nginx -c ${conf} -g daemon off; (preflight: nginx -t -c ${conf})`
      ]);
      expect(logger.warn).not.toHaveBeenCalled();
      expect(supervisor.status().map(status => status.state)).toEqual(['unknown', 'unknown']);
    });
  });
});
