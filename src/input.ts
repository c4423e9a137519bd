import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage, failure, success, type ServiceResult } from './errors.js';
import { IMAGE_FORMATS, type ImageFormat, type ImageMimeType, type NormalizedInput } from './types.js';

const EXTENSION_FORMATS: Readonly<Record<string, ImageFormat>> = {
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.webp': 'webp',
};

const FORMAT_ALIASES: Readonly<Record<string, ImageFormat>> = {
  jpg: 'jpeg',
  jpeg: 'jpeg',
  png: 'png',
  webp: 'webp',
};

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function mimeTypeFor(format: ImageFormat): ImageMimeType {
  return `image/${format}`;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function deriveOutputPath(imagePath: string): string {
  const parsed = path.parse(imagePath);
  return path.format({ dir: parsed.dir, name: parsed.name, ext: '.glb' });
}

export function resolveImageFormat(value: unknown): ImageFormat | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  return FORMAT_ALIASES[value.trim().toLowerCase()];
}

/**
 * Strict base64 decoding. Node's decoder silently skips characters outside the
 * alphabet, so the text is checked before it is decoded.
 */
export function decodeBase64Image(value: string): Buffer | undefined {
  const compact = value.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (compact.length === 0 || compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) {
    return undefined;
  }
  if (compact.includes('=') && compact.length % 4 !== 0) {
    return undefined;
  }
  return Buffer.from(compact, 'base64');
}

export async function normalizePathInput(
  imagePathValue: unknown,
  outputPathValue?: unknown
): Promise<ServiceResult<NormalizedInput>> {
  const imagePath = optionalString(imagePathValue);
  if (!imagePath) {
    return failure('InvalidInput', '"image_path" is required and must be a non-empty string.');
  }

  let stats;
  try {
    stats = await fs.stat(imagePath);
  } catch (error: unknown) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return failure('NotFound', `Input image file not found: ${imagePath}`);
    }
    return failure('InvalidInput', `Error reading image file: ${errorMessage(error)}`);
  }

  if (!stats.isFile()) {
    return failure('InvalidInput', `Input image path is not a file: ${imagePath}`);
  }

  const format = EXTENSION_FORMATS[path.extname(imagePath).toLowerCase()];
  if (!format) {
    return failure('InvalidInput', 'Unsupported image format. Supported formats: JPEG, PNG, WebP');
  }

  let data: Buffer;
  try {
    data = await fs.readFile(imagePath);
  } catch (error: unknown) {
    return failure('InvalidInput', `Error reading image file: ${errorMessage(error)}`);
  }

  if (data.length === 0) {
    return failure('InvalidInput', `Input image file is empty: ${imagePath}`);
  }

  return success({
    image: {
      data,
      mimeType: mimeTypeFor(format),
      filename: path.basename(imagePath),
    },
    outputPath: optionalString(outputPathValue) ?? deriveOutputPath(imagePath),
  });
}

export function normalizeBase64Input(
  imageBase64Value: unknown,
  imageFormatValue: unknown,
  outputPathValue: unknown
): ServiceResult<NormalizedInput> {
  const format = resolveImageFormat(imageFormatValue);
  if (!format) {
    const got = typeof imageFormatValue === 'string' ? `"${imageFormatValue}"` : String(imageFormatValue);
    return failure(
      'InvalidInput',
      `image_format must be one of ${IMAGE_FORMATS.map((entry) => `"${entry}"`).join(', ')}, got ${got}`
    );
  }

  if (typeof imageBase64Value !== 'string') {
    return failure('InvalidInput', '"image_base64" is required and must be a base64 string.');
  }

  const data = decodeBase64Image(imageBase64Value);
  if (!data || data.length === 0) {
    return failure('InvalidInput', 'Error decoding base64 image: the payload is empty or not valid base64.');
  }

  const outputPath = optionalString(outputPathValue);
  if (!outputPath) {
    return failure('InvalidInput', '"output_path" is required when the image is supplied as base64.');
  }

  return success({
    image: {
      data,
      mimeType: mimeTypeFor(format),
      filename: `image.${format}`,
    },
    outputPath,
  });
}
