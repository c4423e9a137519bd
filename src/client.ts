// Stability AI Stable Fast 3D API client

import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
  type AxiosResponseHeaders,
  type RawAxiosResponseHeaders,
} from 'axios';
import FormData from 'form-data';
import type { Fast3dConfig } from './config.js';
import { errorMessage, failure, success, type ServiceResult } from './errors.js';
import { VERTEX_COUNT_UNLIMITED, type GenerationRequest, type RawApiResponse } from './types.js';

export const GENERATION_PATH = '/v2beta/3d/stable-fast-3d';
export const BALANCE_PATH = '/v1/user/balance';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * The two calls the server makes against the remote service. Implementations
 * report what came back without interpreting it.
 */
export interface Fast3dApi {
  submitGeneration(request: GenerationRequest, signal?: AbortSignal): Promise<ServiceResult<RawApiResponse>>;
  checkBalance(signal?: AbortSignal): Promise<ServiceResult<RawApiResponse>>;
}

function headerValue(
  headers: RawAxiosResponseHeaders | AxiosResponseHeaders,
  name: string
): string | undefined {
  const value: unknown = headers[name];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return undefined;
}

export class StabilityFast3dClient implements Fast3dApi {
  private axiosInstance: AxiosInstance;

  constructor(private readonly config: Fast3dConfig) {
    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      responseType: 'arraybuffer',
      // Every status is handed back to the caller untouched
      validateStatus: () => true,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
  }

  private buildRequestConfig(
    apiKey: string,
    headers: Record<string, string>,
    extra: Omit<AxiosRequestConfig, 'headers'>
  ): AxiosRequestConfig {
    return {
      ...extra,
      headers: {
        ...headers,
        authorization: `Bearer ${apiKey}`,
      },
    };
  }

  private requireApiKey(): ServiceResult<string> {
    if (!this.config.apiKey) {
      return failure(
        'MissingCredentials',
        'STABILITY_API_KEY environment variable is not set. Please set it to your Stability AI API key.'
      );
    }
    return success(this.config.apiKey);
  }

  /**
   * Send one synchronous image-to-3D generation. The service answers with the
   * GLB bytes directly; there is no job to poll.
   */
  async submitGeneration(request: GenerationRequest, signal?: AbortSignal): Promise<ServiceResult<RawApiResponse>> {
    const apiKey = this.requireApiKey();
    if (!apiKey.ok) {
      return apiKey;
    }

    const { image, outputPath, parameters } = request;
    console.error(
      '[Fast3D] Generating 3D model | image=%s (%d bytes) output=%s texture=%s foreground=%s remesh=%s vertices=%d',
      image.filename,
      image.data.length,
      outputPath,
      parameters.textureResolution,
      parameters.foregroundRatio,
      parameters.remesh,
      parameters.vertexCount
    );

    const form = new FormData();
    form.append('image', image.data, {
      filename: image.filename,
      contentType: image.mimeType,
    });
    form.append('texture_resolution', parameters.textureResolution);
    form.append('foreground_ratio', String(parameters.foregroundRatio));
    form.append('remesh', parameters.remesh);
    if (parameters.vertexCount !== VERTEX_COUNT_UNLIMITED) {
      form.append('vertex_count', String(parameters.vertexCount));
    }

    return this.send(() =>
      this.axiosInstance.post<ArrayBuffer>(
        GENERATION_PATH,
        form,
        this.buildRequestConfig(apiKey.data, form.getHeaders(), {
          timeout: this.config.generationTimeoutMs,
          signal,
        })
      )
    );
  }

  async checkBalance(signal?: AbortSignal): Promise<ServiceResult<RawApiResponse>> {
    const apiKey = this.requireApiKey();
    if (!apiKey.ok) {
      return apiKey;
    }

    console.error('[Fast3D] Checking credit balance');
    return this.send(() =>
      this.axiosInstance.get<ArrayBuffer>(
        BALANCE_PATH,
        this.buildRequestConfig(apiKey.data, { accept: 'application/json' }, {
          timeout: this.config.balanceTimeoutMs,
          signal,
        })
      )
    );
  }

  private async send(
    request: () => Promise<AxiosResponse<ArrayBuffer>>
  ): Promise<ServiceResult<RawApiResponse>> {
    try {
      const response = await request();
      return success<RawApiResponse>({
        kind: 'http',
        status: response.status,
        contentType: headerValue(response.headers, 'content-type'),
        retryAfter: headerValue(response.headers, 'retry-after'),
        body: Buffer.from(response.data),
      });
    } catch (error) {
      return success(this.toTransportFailure(error));
    }
  }

  /**
   * Connection-level failures: no HTTP response arrived
   */
  private toTransportFailure(error: unknown): RawApiResponse {
    if (axios.isCancel(error)) {
      return {
        kind: 'transport',
        code: 'ERR_CANCELED',
        message: errorMessage(error),
        timedOut: false,
        cancelled: true,
      };
    }

    if (axios.isAxiosError(error)) {
      const code = error.code;
      return {
        kind: 'transport',
        ...(code !== undefined ? { code } : {}),
        message: error.message,
        timedOut: code !== undefined && TIMEOUT_CODES.has(code),
        cancelled: false,
      };
    }

    throw error;
  }
}
