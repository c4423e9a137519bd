import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Fast3dApi } from '../src/client.js';
import type { Fast3dConfig } from '../src/config.js';
import type { ServiceResult } from '../src/errors.js';
import type { GenerationRequest, RawApiResponse } from '../src/types.js';

export const ONE_BY_ONE_PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mP8/x8AAwMCAO+ip1sAAAAASUVORK5CYII=';

export const PNG_BYTES = Buffer.from(ONE_BY_ONE_PNG_BASE64, 'base64');

// A GLB header ("glTF", version 2, total length 20) followed by filler bytes
export const GLB_BYTES = Buffer.concat([
  Buffer.from('glTF', 'ascii'),
  Buffer.from([0x02, 0x00, 0x00, 0x00, 0x14, 0x00, 0x00, 0x00]),
  Buffer.from('testmesh', 'ascii'),
]);

export function testConfig(overrides: Partial<Fast3dConfig> = {}): Fast3dConfig {
  return {
    apiKey: 'test-key',
    baseUrl: 'http://127.0.0.1:9',
    generationTimeoutMs: 5000,
    balanceTimeoutMs: 5000,
    ...overrides,
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `fast3d-${prefix}-`));
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function httpResponse(
  status: number,
  body: Buffer | string,
  extra: { contentType?: string; retryAfter?: string } = {}
): RawApiResponse {
  return {
    kind: 'http',
    status,
    body: typeof body === 'string' ? Buffer.from(body, 'utf-8') : body,
    ...extra,
  };
}

export function glbResponse(): ServiceResult<RawApiResponse> {
  return { ok: true, data: httpResponse(200, GLB_BYTES, { contentType: 'model/gltf-binary' }) };
}

/**
 * Fast3dApi stand-in that records every call and replays canned responses.
 */
export class RecordingApi implements Fast3dApi {
  readonly generationRequests: GenerationRequest[] = [];
  balanceCalls = 0;

  constructor(
    private readonly generationResponse: ServiceResult<RawApiResponse> = glbResponse(),
    private readonly balanceResponse: ServiceResult<RawApiResponse> = {
      ok: true,
      data: httpResponse(200, '{"credits":42.5}', { contentType: 'application/json' }),
    }
  ) {}

  get networkCalls(): number {
    return this.generationRequests.length + this.balanceCalls;
  }

  async submitGeneration(request: GenerationRequest): Promise<ServiceResult<RawApiResponse>> {
    this.generationRequests.push(request);
    return this.generationResponse;
  }

  async checkBalance(): Promise<ServiceResult<RawApiResponse>> {
    this.balanceCalls += 1;
    return this.balanceResponse;
  }
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingMessage['headers'];
  body: Buffer;
}

export interface StubServer {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

type StubHandler = (request: RecordedRequest, res: ServerResponse) => void;

/**
 * In-process HTTP server on 127.0.0.1 standing in for the Stability API.
 */
export async function startStubServer(handler: StubHandler): Promise<StubServer> {
  // Requests to 127.0.0.1 must not be routed through a proxy from the environment
  for (const name of ['http_proxy', 'HTTP_PROXY', 'https_proxy', 'HTTPS_PROXY']) {
    delete process.env[name];
  }

  const requests: RecordedRequest[] = [];
  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks),
      };
      requests.push(recorded);
      handler(recorded, res);
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address() as AddressInfo;

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      }),
  };
}
