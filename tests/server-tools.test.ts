import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import { promises as fs } from 'fs';
import { ErrorCode, McpError, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { API_INFO_URI } from '../src/api-info.js';
import type { Fast3dApi } from '../src/client.js';
import { Fast3dMcpServer } from '../src/index.js';
import {
  GLB_BYTES,
  makeTempDir,
  ONE_BY_ONE_PNG_BASE64,
  PNG_BYTES,
  RecordingApi,
  startStubServer,
  testConfig,
} from './helpers.js';

interface ErrorPayload {
  success: false;
  error: { kind: string; message: string; retriable: boolean; status?: number; details?: string[] };
  credits_charged: number;
}

function textEntries(result: CallToolResult): string[] {
  return result.content.flatMap((entry) => (entry.type === 'text' ? [entry.text] : []));
}

function errorPayload(result: CallToolResult): ErrorPayload {
  assert.equal(result.isError, true);
  const [, json] = textEntries(result);
  return JSON.parse(json);
}

test('generate_3d_model returns a summary and a JSON payload', async () => {
  const tmpRoot = await makeTempDir('server');
  try {
    const imagePath = path.join(tmpRoot, 'cat.png');
    await fs.writeFile(imagePath, PNG_BYTES);
    const server = new Fast3dMcpServer({ config: testConfig(), api: new RecordingApi() });

    const result = await server.callTool('generate_3d_model', {
      image_path: imagePath,
      texture_resolution: '512',
    });

    const outputPath = path.join(tmpRoot, 'cat.glb');
    assert.equal(result.isError, undefined);
    const [summary, json] = textEntries(result);
    assert.equal(summary, `Successfully generated 3D model: ${outputPath}`);
    assert.deepEqual(JSON.parse(json), {
      success: true,
      output_path: outputPath,
      bytes_written: GLB_BYTES.length,
      credits_charged: 10,
      parameters: {
        texture_resolution: '512',
        foreground_ratio: 0.85,
        remesh: 'none',
        vertex_count: -1,
      },
    });
  } finally {
    await fs.rm(tmpRoot, { recursive: true, force: true });
  }
});

test('generate_3d_model_from_base64 reports aggregated validation errors as a structured payload', async () => {
  const api = new RecordingApi();
  const server = new Fast3dMcpServer({ config: testConfig(), api });

  const result = await server.callTool('generate_3d_model_from_base64', {
    image_base64: ONE_BY_ONE_PNG_BASE64,
    image_format: 'png',
    output_path: '/tmp/never-written.glb',
    remesh: 'hex',
    vertex_count: 20001,
  });

  const payload = errorPayload(result);
  assert.equal(payload.success, false);
  assert.equal(payload.credits_charged, 0);
  assert.equal(payload.error.kind, 'InvalidInput');
  assert.equal(payload.error.retriable, false);
  assert.deepEqual(payload.error.details, [
    'remesh must be one of "none", "quad", "triangle", got "hex"',
    'vertex_count must be -1 (no limit) or between 1 and 20000, got 20001',
  ]);
  assert.equal(textEntries(result)[0], `Error: ${payload.error.message}`);
  assert.equal(api.networkCalls, 0);
});

test('check_api_balance formats the credits', async () => {
  const server = new Fast3dMcpServer({ config: testConfig(), api: new RecordingApi() });
  const result = await server.callTool('check_api_balance', {});
  const [summary, json] = textEntries(result);
  assert.equal(summary, 'Current credit balance: 42.50 credits');
  assert.deepEqual(JSON.parse(json), { credits: 42.5 });
});

test('unknown tools are a protocol error', async () => {
  const server = new Fast3dMcpServer({ config: testConfig(), api: new RecordingApi() });
  await assert.rejects(
    () => server.callTool('generate_image', {}),
    (error: unknown) => error instanceof McpError && error.code === ErrorCode.MethodNotFound
  );
});

test('an unexpected exception becomes an Unknown error payload', async () => {
  const failingApi: Fast3dApi = {
    submitGeneration: async () => {
      throw new Error('boom');
    },
    checkBalance: async () => {
      throw new Error('boom');
    },
  };
  const server = new Fast3dMcpServer({ config: testConfig(), api: failingApi });

  const payload = errorPayload(await server.callTool('check_api_balance', undefined));
  assert.equal(payload.error.kind, 'Unknown');
  assert.equal(payload.error.message, 'Tool execution failed: boom');
});

test('without an API key every tool fails with MissingCredentials and no request is sent', async () => {
  const stub = await startStubServer((_request, res) => {
    res.writeHead(200, { 'Content-Type': 'model/gltf-binary' });
    res.end(GLB_BYTES);
  });
  const tmpRoot = await makeTempDir('server');

  try {
    const imagePath = path.join(tmpRoot, 'cat.png');
    await fs.writeFile(imagePath, PNG_BYTES);
    const server = new Fast3dMcpServer({ config: testConfig({ apiKey: undefined, baseUrl: stub.baseUrl }) });

    const results = [
      await server.callTool('generate_3d_model', { image_path: imagePath }),
      await server.callTool('generate_3d_model_from_base64', {
        image_base64: ONE_BY_ONE_PNG_BASE64,
        image_format: 'png',
        output_path: path.join(tmpRoot, 'b64.glb'),
      }),
      await server.callTool('check_api_balance', {}),
    ];

    for (const result of results) {
      const payload = errorPayload(result);
      assert.equal(payload.error.kind, 'MissingCredentials');
      assert.equal(payload.credits_charged, 0);
    }
    assert.equal(stub.requests.length, 0);
  } finally {
    await stub.close();
    await fs.rm(tmpRoot, { recursive: true, force: true });
  }
});

test('the API info resource is served as markdown', () => {
  const server = new Fast3dMcpServer({ config: testConfig(), api: new RecordingApi() });
  const { contents } = server.readResource(API_INFO_URI);
  assert.equal(contents.length, 1);
  const [entry] = contents;
  assert.equal(entry.uri, API_INFO_URI);
  assert.equal(entry.mimeType, 'text/markdown');
  assert.ok('text' in entry && typeof entry.text === 'string');
  assert.ok(entry.text.startsWith('# Stable Fast 3D API Information\n'));
  assert.ok(entry.text.includes('- **10 credits** per successful generation\n'));

  assert.throws(
    () => server.readResource('info://unknown'),
    (error: unknown) => error instanceof McpError && error.code === ErrorCode.InvalidRequest
  );
});
