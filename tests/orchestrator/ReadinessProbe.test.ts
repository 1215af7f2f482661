import http from 'node:http';
import net from 'node:net';
import { describe, it, expect, afterEach } from 'vitest';
import type { ServiceSpec } from '../../src/config/OrchestrationConfig';
import { NetworkReadinessProbe, expandEnv, resolveTcpTarget } from '../../src/orchestrator/ReadinessProbe';

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server has no port'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

const service = (readiness: ServiceSpec['readiness']): ServiceSpec => ({
  name: 'database',
  command: [ 'python', 'server/db.py' ],
  windowIndex: 0,
  settleDelay: 0,
  readiness,
});

describe('expandEnv', () => {
  it('replaces known references and blanks unknown ones', () => {
    expect(expandEnv('${DB_HOST}:${DB_PORT}/${MISSING}', { DB_HOST: 'localhost', DB_PORT: '8890' })).toBe('localhost:8890/');
  });
});

describe('resolveTcpTarget', () => {
  it('expands host and port from the environment', () => {
    expect(resolveTcpTarget({ type: 'tcp', host: '${DB_HOST}', port: '${DB_PORT}' }, { DB_HOST: 'localhost', DB_PORT: '8890' }))
      .toEqual({ host: 'localhost', port: 8890 });
  });

  it('rejects targets that expand to nothing usable', () => {
    expect(resolveTcpTarget({ type: 'tcp', host: '${DB_HOST}', port: 8890 }, {})).toBeUndefined();
    expect(resolveTcpTarget({ type: 'tcp', host: 'localhost', port: '${DB_PORT}' }, { DB_PORT: 'abc' })).toBeUndefined();
    expect(resolveTcpTarget({ type: 'tcp', host: 'localhost', port: 70000 }, {})).toBeUndefined();
  });
});

describe('NetworkReadinessProbe', () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(async (server) => server.listening ? close(server) : undefined));
  });

  it('treats services without a readiness declaration as ready', async () => {
    await expect(new NetworkReadinessProbe().isReady(service(undefined))).resolves.toBe(true);
  });

  it('is ready once the port accepts connections', async () => {
    const server = net.createServer((socket) => socket.end());
    servers.push(server);
    const port = await listen(server);
    const probe = new NetworkReadinessProbe({ env: { DB_PORT: String(port) } });

    await expect(probe.isReady(service({ type: 'tcp', host: '127.0.0.1', port: '${DB_PORT}' }))).resolves.toBe(true);

    await close(server);
    await expect(probe.isReady(service({ type: 'tcp', host: '127.0.0.1', port: '${DB_PORT}' }))).resolves.toBe(false);
  });

  it('is not ready when the port variable is unset', async () => {
    const probe = new NetworkReadinessProbe({ env: {} });
    await expect(probe.isReady(service({ type: 'tcp', host: '127.0.0.1', port: '${DB_PORT}' }))).resolves.toBe(false);
  });

  it('accepts HTTP answers below 500', async () => {
    let status = 503;
    const server = http.createServer((_req, res) => {
      res.statusCode = status;
      res.end();
    });
    servers.push(server);
    const port = await listen(server);
    const probe = new NetworkReadinessProbe();
    const spec = service({ type: 'http', url: `http://127.0.0.1:${port}/health` });

    await expect(probe.isReady(spec)).resolves.toBe(false);
    status = 404;
    await expect(probe.isReady(spec)).resolves.toBe(true);
  });
});
