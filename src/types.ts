// Type definitions for the Stability AI Stable Fast 3D API

export const TEXTURE_RESOLUTIONS = ['512', '1024', '2048'] as const;
export const REMESH_MODES = ['none', 'quad', 'triangle'] as const;
export const IMAGE_FORMATS = ['jpeg', 'png', 'webp'] as const;

export type TextureResolution = (typeof TEXTURE_RESOLUTIONS)[number];
export type RemeshMode = (typeof REMESH_MODES)[number];
export type ImageFormat = (typeof IMAGE_FORMATS)[number];
export type ImageMimeType = `image/${ImageFormat}`;

export const FOREGROUND_RATIO_MIN = 0.1;
export const FOREGROUND_RATIO_MAX = 1.0;
export const VERTEX_COUNT_UNLIMITED = -1;
export const VERTEX_COUNT_MAX = 20000;

// Flat cost of one successful generation; failed generations are not billed
export const GENERATION_CREDIT_COST = 10;

// Documented remote admission limit
export const RATE_LIMIT_REQUESTS = 150;
export const RATE_LIMIT_WINDOW_SECONDS = 10;

export interface GenerationParameters {
  textureResolution: TextureResolution;
  foregroundRatio: number;
  remesh: RemeshMode;
  vertexCount: number;
}

export const DEFAULT_GENERATION_PARAMETERS: Readonly<GenerationParameters> = Object.freeze({
  textureResolution: '1024',
  foregroundRatio: 0.85,
  remesh: 'none',
  vertexCount: VERTEX_COUNT_UNLIMITED,
});

export interface ImagePayload {
  data: Buffer;
  mimeType: ImageMimeType;
  filename: string;
}

export interface NormalizedInput {
  image: ImagePayload;
  outputPath: string;
}

export interface GenerationRequest extends NormalizedInput {
  parameters: GenerationParameters;
}

export interface GenerationResult {
  readonly success: true;
  readonly outputPath: string;
  readonly bytesWritten: number;
  readonly creditsCharged: number;
}

export interface BalanceResult {
  readonly credits: number;
}

/**
 * What came back from the wire, uninterpreted.
 *
 * `http` covers every status code the service answered with; `transport` covers
 * the cases where no response arrived at all.
 */
export type RawApiResponse =
  | {
      kind: 'http';
      status: number;
      contentType?: string;
      retryAfter?: string;
      body: Buffer;
    }
  | {
      kind: 'transport';
      code?: string;
      message: string;
      timedOut: boolean;
      cancelled: boolean;
    };

// Tool arguments as they arrive over MCP

export interface GenerationToolArguments {
  [key: string]: unknown;
  texture_resolution?: unknown;
  foreground_ratio?: unknown;
  remesh?: unknown;
  vertex_count?: unknown;
}

export interface GenerateFromPathArguments extends GenerationToolArguments {
  image_path?: unknown;
  output_path?: unknown;
}

export interface GenerateFromBase64Arguments extends GenerationToolArguments {
  image_base64?: unknown;
  image_format?: unknown;
  output_path?: unknown;
}

// Error body shape returned by the Stability AI REST API
export interface StabilityErrorBody {
  id?: string;
  name?: string;
  message?: string;
  errors?: string[];
}

export interface StabilityBalanceBody {
  credits?: unknown;
}
