/**
 * Integration Tests: Node-backed probes
 *
 * Real filesystem (temp dir), real loopback listeners, and an in-process HTTP server.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as net from 'net';
import * as http from 'http';
import { ConfigValidationBuilder } from '../../src/validation/config-validation-builder.js';
import { NodeFileSystemProbe } from '../../src/infra/local/file-system-probe/index.js';
import { NodePortProbe } from '../../src/infra/local/port-probe/index.js';
import { FetchHttpProbe } from '../../src/infra/local/http-probe/index.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

interface ServerConfig {
  certificatePath?: string;
  dataDirectory?: string;
  port?: number;
  healthCheckUrl?: string;
}

const logger = new FakeLoggerFactory().create('node-probes');

function server(): ConfigValidationBuilder<ServerConfig> {
  return new ConfigValidationBuilder<ServerConfig>('Server', { logger, urlTimeoutMs: 2_000 });
}

function listen(target: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    target.once('error', reject);
    target.listen({ port: 0, host: '127.0.0.1' }, () => {
      const address = target.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('expected a TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(target: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    target.close((error) => (error ? reject(error) : resolve()));
  });
}

describe('NodeFileSystemProbe', () => {
  let tempDir: string;
  let certificatePath: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'configkit-'));
    certificatePath = path.join(tempDir, 'cert.pem');
    await fs.writeFile(certificatePath, 'not really a certificate');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('classifies files, directories, and missing paths', async () => {
    const probe = new NodeFileSystemProbe();
    expect(expectOk(await probe.pathKind(certificatePath), 'path kind')).toBe('file');
    expect(expectOk(await probe.pathKind(tempDir), 'path kind')).toBe('directory');
    expect(expectOk(await probe.pathKind(path.join(tempDir, 'absent.pem')), 'path kind')).toBe('missing');
    expect(expectOk(await probe.pathKind(path.join(certificatePath, 'child')), 'path kind')).toBe('missing');
  });

  it('backs fileExists and directoryExists', async () => {
    const missing = path.join(tempDir, 'absent.pem');
    const errors = await server()
      .fileExists('certificatePath')
      .directoryExists('dataDirectory')
      .validate({ certificatePath: missing, dataDirectory: tempDir });

    expect(errors.map((e) => e.message)).toEqual([`File does not exist: ${missing}`]);
  });
});

describe('NodePortProbe', () => {
  let occupied: net.Server;
  let occupiedPort: number;

  beforeAll(async () => {
    occupied = net.createServer();
    occupiedPort = await listen(occupied);
  });

  afterAll(async () => {
    await close(occupied);
  });

  it('reports a port held by another listener as in use', async () => {
    const error = expectErr(await new NodePortProbe().tryBind(occupiedPort), 'occupied port');
    expect(error).toEqual({ code: 'PORT_IN_USE', message: `Port ${occupiedPort} is already in use` });

    const [failure] = await server().portAvailable('port').validate({ port: occupiedPort });
    expect(failure?.message).toBe(`Port ${occupiedPort} is already in use`);
  });

  it('passes a free port and releases it again', async () => {
    const scratch = net.createServer();
    const freePort = await listen(scratch);
    await close(scratch);

    expect(await server().portAvailable('port').validate({ port: freePort })).toEqual([]);
    // Released: a second probe can bind it again.
    expect((await new NodePortProbe().tryBind(freePort)).isOk()).toBe(true);
  });
});

describe('FetchHttpProbe', () => {
  let httpServer: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    httpServer = http.createServer((req, res) => {
      if (req.url === '/slow') {
        // Never answers; the probe's deadline fires first.
        return;
      }
      res.statusCode = req.url === '/health' ? 200 : 500;
      res.end('ok');
    });
    const port = await listen(httpServer);
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    httpServer.closeAllConnections();
    await close(httpServer);
  });

  it('passes a 200 response', async () => {
    expect(await server().urlReachable('healthCheckUrl').validate({ healthCheckUrl: `${baseUrl}/health` })).toEqual([]);
  });

  it('reports a 500 response', async () => {
    const [error] = await server().urlReachable('healthCheckUrl').validate({ healthCheckUrl: `${baseUrl}/broken` });
    expect(error?.message).toBe(`URL returned 500: ${baseUrl}/broken`);
  });

  it('reports a timeout', async () => {
    const [error] = await server().urlReachable('healthCheckUrl', 200).validate({ healthCheckUrl: `${baseUrl}/slow` });
    expect(error?.message).toBe('Failed to reach URL: Request timed out after 200ms');
  });

  it('reports a refused connection as a transport failure', async () => {
    const scratch = net.createServer();
    const closedPort = await listen(scratch);
    await close(scratch);

    const error = expectErr(
      await new FetchHttpProbe().get(new URL(`http://127.0.0.1:${closedPort}/`), 2_000),
      'refused connection'
    );
    expect(error.code).toBe('HTTP_TRANSPORT');
  });

  it('reports an invalid URL without a request', async () => {
    const [error] = await server().urlReachable('healthCheckUrl').validate({ healthCheckUrl: 'not a url' });
    expect(error?.message).toBe('Invalid URL format: not a url');
  });
});
