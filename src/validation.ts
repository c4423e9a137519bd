import { failure, success, type ServiceResult } from './errors.js';
import {
  DEFAULT_GENERATION_PARAMETERS,
  FOREGROUND_RATIO_MAX,
  FOREGROUND_RATIO_MIN,
  REMESH_MODES,
  TEXTURE_RESOLUTIONS,
  VERTEX_COUNT_MAX,
  VERTEX_COUNT_UNLIMITED,
  type GenerationParameters,
  type GenerationToolArguments,
  type RemeshMode,
  type TextureResolution,
} from './types.js';

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function describe(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

function quoteAll(values: readonly string[]): string {
  return values.map((value) => `"${value}"`).join(', ');
}

function isTextureResolution(value: unknown): value is TextureResolution {
  return typeof value === 'string' && TEXTURE_RESOLUTIONS.some((resolution) => resolution === value);
}

function isRemeshMode(value: unknown): value is RemeshMode {
  return typeof value === 'string' && REMESH_MODES.some((mode) => mode === value);
}

// Plain decimal notation only; Number() would also take hex, binary and octal literals
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return Number(value);
  }
  return undefined;
}

/**
 * Check generation parameters against the service's documented domains.
 *
 * Absent values take the defaults. Every offending field is reported in a single
 * InvalidInput error so a caller can fix them all at once.
 */
export function validateGenerationParameters(
  args: GenerationToolArguments
): ServiceResult<GenerationParameters> {
  const issues: string[] = [];
  const parameters: GenerationParameters = { ...DEFAULT_GENERATION_PARAMETERS };

  const textureResolution = args.texture_resolution;
  if (!isAbsent(textureResolution)) {
    if (isTextureResolution(textureResolution)) {
      parameters.textureResolution = textureResolution;
    } else {
      issues.push(
        `texture_resolution must be one of ${quoteAll(TEXTURE_RESOLUTIONS)}, got ${describe(textureResolution)}`
      );
    }
  }

  const foregroundRatio = args.foreground_ratio;
  if (!isAbsent(foregroundRatio)) {
    const numeric = toNumber(foregroundRatio);
    if (numeric === undefined || !Number.isFinite(numeric)) {
      issues.push(`foreground_ratio must be a finite number, got ${describe(foregroundRatio)}`);
    } else if (numeric < FOREGROUND_RATIO_MIN || numeric > FOREGROUND_RATIO_MAX) {
      issues.push(
        `foreground_ratio must be between ${FOREGROUND_RATIO_MIN} and ${FOREGROUND_RATIO_MAX.toFixed(1)}, got ${numeric}`
      );
    } else {
      parameters.foregroundRatio = numeric;
    }
  }

  const remesh = args.remesh;
  if (!isAbsent(remesh)) {
    if (isRemeshMode(remesh)) {
      parameters.remesh = remesh;
    } else {
      issues.push(`remesh must be one of ${quoteAll(REMESH_MODES)}, got ${describe(remesh)}`);
    }
  }

  const vertexCount = args.vertex_count;
  if (!isAbsent(vertexCount)) {
    const numeric = toNumber(vertexCount);
    if (numeric === undefined || !Number.isInteger(numeric)) {
      issues.push(`vertex_count must be an integer, got ${describe(vertexCount)}`);
    } else if (numeric !== VERTEX_COUNT_UNLIMITED && (numeric < 1 || numeric > VERTEX_COUNT_MAX)) {
      issues.push(
        `vertex_count must be ${VERTEX_COUNT_UNLIMITED} (no limit) or between 1 and ${VERTEX_COUNT_MAX}, got ${numeric}`
      );
    } else {
      parameters.vertexCount = numeric;
    }
  }

  if (issues.length > 0) {
    return failure('InvalidInput', `Invalid generation parameters: ${issues.join('; ')}`, {
      details: issues,
    });
  }

  return success(parameters);
}
