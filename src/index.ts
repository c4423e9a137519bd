#!/usr/bin/env node
/**
 * Stable Fast 3D MCP Server
 *
 * Exposes Stability AI's image-to-3D generation and the account balance check
 * as MCP tools over stdio.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  McpError,
  ErrorCode,
  type CallToolResult,
  type ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';
import { API_INFO_MARKDOWN, API_INFO_URI } from './api-info.js';
import { StabilityFast3dClient, type Fast3dApi } from './client.js';
import { loadConfig, type Fast3dConfig } from './config.js';
import { apiError, errorMessage, type ApiError, type ServiceResult } from './errors.js';
import { checkApiBalance, generateModelFromBase64, generateModelFromPath, type GenerationOutcome } from './service.js';
import {
  DEFAULT_GENERATION_PARAMETERS,
  FOREGROUND_RATIO_MAX,
  FOREGROUND_RATIO_MIN,
  GENERATION_CREDIT_COST,
  IMAGE_FORMATS,
  REMESH_MODES,
  TEXTURE_RESOLUTIONS,
  VERTEX_COUNT_MAX,
  type BalanceResult,
} from './types.js';

export const SERVER_NAME = 'fast3d-mcp-server';
export const SERVER_VERSION = '1.0.0';

export interface Fast3dMcpServerOptions {
  config?: Fast3dConfig;
  api?: Fast3dApi;
}

const generationParameterSchema = {
  texture_resolution: {
    type: 'string',
    enum: [...TEXTURE_RESOLUTIONS],
    default: DEFAULT_GENERATION_PARAMETERS.textureResolution,
    description: 'Resolution of the albedo and normal texture maps. Higher values add detail and file size.',
  },
  foreground_ratio: {
    type: 'number',
    minimum: FOREGROUND_RATIO_MIN,
    maximum: FOREGROUND_RATIO_MAX,
    default: DEFAULT_GENERATION_PARAMETERS.foregroundRatio,
    description: 'Padding around the object (0.1-1.0). Higher means less padding and a larger object.',
  },
  remesh: {
    type: 'string',
    enum: [...REMESH_MODES],
    default: DEFAULT_GENERATION_PARAMETERS.remesh,
    description: 'Remeshing algorithm. "quad" suits DCC tools such as Maya or Blender.',
  },
  vertex_count: {
    type: 'integer',
    minimum: -1,
    maximum: VERTEX_COUNT_MAX,
    default: DEFAULT_GENERATION_PARAMETERS.vertexCount,
    description: `Target vertex count for mesh simplification (-1 for no limit, otherwise 1-${VERTEX_COUNT_MAX}).`,
  },
};

function asArguments(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

export class Fast3dMcpServer {
  private server: Server;
  private readonly config: Fast3dConfig;
  private readonly api: Fast3dApi;

  constructor(options: Fast3dMcpServerOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.api = options.api ?? new StabilityFast3dClient(this.config);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.setupToolHandlers();
    this.setupResourceHandlers();
    this.server.onerror = (error) => {
      console.error('[MCP Error]', error);
    };
    this.warnIfConfigMissing();
  }

  private warnIfConfigMissing(): void {
    if (!this.config.apiKey) {
      console.warn('[Fast3D] STABILITY_API_KEY is not set. Tool calls will fail with MissingCredentials until it is configured.');
    }
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [
          {
            name: 'generate_3d_model',
            description: `Generate a 3D model (GLB file) from an image file using Stability AI's Stable Fast 3D API. Costs ${GENERATION_CREDIT_COST} credits per successful generation; failures are free.`,
            inputSchema: {
              type: 'object',
              properties: {
                image_path: {
                  type: 'string',
                  description: 'Path to the input image (JPEG, PNG or WebP). Each side 64-2048px, 4,096 to 4,194,304 pixels in total.',
                },
                output_path: {
                  type: 'string',
                  description: 'Where to write the GLB file. Defaults to the input path with a .glb extension.',
                },
                ...generationParameterSchema,
              },
              required: ['image_path'],
            },
          },
          {
            name: 'generate_3d_model_from_base64',
            description: 'Generate a 3D model (GLB file) from a base64-encoded image using Stable Fast 3D.',
            inputSchema: {
              type: 'object',
              properties: {
                image_base64: {
                  type: 'string',
                  description: 'Base64-encoded image data (a data URL prefix is tolerated).',
                },
                image_format: {
                  type: 'string',
                  enum: [...IMAGE_FORMATS, 'jpg'],
                  description: 'Format of the encoded image.',
                },
                output_path: {
                  type: 'string',
                  description: 'Where to write the GLB file.',
                },
                ...generationParameterSchema,
              },
              required: ['image_base64', 'image_format', 'output_path'],
            },
          },
          {
            name: 'check_api_balance',
            description: 'Check the remaining credit balance of the configured Stability AI account.',
            inputSchema: {
              type: 'object',
              properties: {},
            },
          },
        ],
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      return this.callTool(request.params.name, request.params.arguments, extra.signal);
    });
  }

  private setupResourceHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return {
        resources: [
          {
            uri: API_INFO_URI,
            name: 'stable-fast-3d-api-info',
            mimeType: 'text/markdown',
            description: 'Stable Fast 3D API overview: cost, input requirements and parameters.',
          },
        ],
      };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      return this.readResource(request.params.uri);
    });
  }

  readResource(uri: string): ReadResourceResult {
    if (uri !== API_INFO_URI) {
      throw new McpError(ErrorCode.InvalidRequest, `Resource not found: ${uri}`);
    }
    return {
      contents: [
        {
          uri,
          mimeType: 'text/markdown',
          text: API_INFO_MARKDOWN,
        },
      ],
    };
  }

  /**
   * Run one tool call. Every outcome, including an unexpected exception, comes
   * back as a tool result; only an unknown tool name is a protocol error.
   */
  async callTool(name: string, rawArgs: unknown, signal?: AbortSignal): Promise<CallToolResult> {
    const args = asArguments(rawArgs);

    try {
      switch (name) {
        case 'generate_3d_model':
          return this.toGenerationResponse(await generateModelFromPath(this.api, args, signal));

        case 'generate_3d_model_from_base64':
          return this.toGenerationResponse(await generateModelFromBase64(this.api, args, signal));

        case 'check_api_balance':
          return this.toBalanceResponse(await checkApiBalance(this.api, signal));

        default:
          throw new McpError(
            ErrorCode.MethodNotFound,
            `Unknown tool: ${name}`
          );
      }
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }

      console.error(`Error in tool ${name}:`, error);
      return this.toErrorResponse(apiError('Unknown', `Tool execution failed: ${errorMessage(error)}`));
    }
  }

  private toGenerationResponse(result: ServiceResult<GenerationOutcome>): CallToolResult {
    if (!result.ok) {
      return this.toErrorResponse(result.error);
    }

    const { outputPath, bytesWritten, creditsCharged, parameters } = result.data;
    return {
      content: [
        {
          type: 'text',
          text: `Successfully generated 3D model: ${outputPath}`,
        },
        {
          type: 'text',
          text: JSON.stringify({
            success: true,
            output_path: outputPath,
            bytes_written: bytesWritten,
            credits_charged: creditsCharged,
            parameters: {
              texture_resolution: parameters.textureResolution,
              foreground_ratio: parameters.foregroundRatio,
              remesh: parameters.remesh,
              vertex_count: parameters.vertexCount,
            },
          }),
        },
      ],
    };
  }

  private toBalanceResponse(result: ServiceResult<BalanceResult>): CallToolResult {
    if (!result.ok) {
      return this.toErrorResponse(result.error);
    }

    return {
      content: [
        {
          type: 'text',
          text: `Current credit balance: ${result.data.credits.toFixed(2)} credits`,
        },
        {
          type: 'text',
          text: JSON.stringify({ credits: result.data.credits }),
        },
      ],
    };
  }

  private toErrorResponse(error: ApiError): CallToolResult {
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Error: ${error.message}`,
        },
        {
          type: 'text',
          text: JSON.stringify({
            success: false,
            error,
            credits_charged: 0,
          }),
        },
      ],
    };
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    process.on('SIGINT', () => {
      this.server
        .close()
        .catch((error: unknown) => {
          console.error('[Fast3D] Error while closing MCP server', error);
        })
        .finally(() => process.exit(0));
    });

    console.error('Stable Fast 3D MCP Server running on stdio');
  }
}

const startServer = async () => {
  try {
    dotenv.config();
    const server = new Fast3dMcpServer({ config: loadConfig(process.env) });
    await server.run();
  } catch (error) {
    console.error('[Fast3D] Failed to start MCP server', error);
    process.exit(1);
  }
};

const isCliEntryPoint = (): boolean => {
  const argvPath = process.argv[1];
  if (typeof argvPath !== 'string' || argvPath.length === 0) {
    return false;
  }

  try {
    const cliRealPath = realpathSync(argvPath);
    const moduleRealPath = realpathSync(fileURLToPath(import.meta.url));
    return cliRealPath === moduleRealPath;
  } catch {
    return false;
  }
};

// Start the server when executed directly (including via npm exec/npx symlinks)
if (isCliEntryPoint()) {
  startServer().catch((error) => {
    console.error('[Fast3D] Unexpected error while starting MCP server', error);
    process.exit(1);
  });
}
