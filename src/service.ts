import type { Fast3dApi } from './client.js';
import { success, type ServiceResult } from './errors.js';
import { normalizeBase64Input, normalizePathInput } from './input.js';
import { prepareOutputPath } from './storage.js';
import { translateBalanceResponse, translateGenerationResponse } from './translator.js';
import type {
  BalanceResult,
  GenerateFromBase64Arguments,
  GenerateFromPathArguments,
  GenerationParameters,
  GenerationResult,
  NormalizedInput,
} from './types.js';
import { validateGenerationParameters } from './validation.js';

export interface GenerationOutcome extends GenerationResult {
  readonly parameters: GenerationParameters;
}

function logFailure(operation: string, result: ServiceResult<unknown>): void {
  if (!result.ok) {
    const { kind, status, retriable } = result.error;
    console.error(
      `[Fast3D] ${operation} failed | kind=${kind} status=${status ?? '-'} retriable=${retriable}: ${result.error.message}`
    );
  }
}

async function runGeneration(
  api: Fast3dApi,
  input: NormalizedInput,
  parameters: GenerationParameters,
  signal?: AbortSignal
): Promise<ServiceResult<GenerationOutcome>> {
  const prepared = await prepareOutputPath(input.outputPath);
  if (!prepared.ok) {
    return prepared;
  }

  const response = await api.submitGeneration({ ...input, parameters }, signal);
  if (!response.ok) {
    return response;
  }

  const translated = await translateGenerationResponse(response.data, input.outputPath, signal);
  if (!translated.ok) {
    return translated;
  }

  return success({ ...translated.data, parameters });
}

async function generate(
  api: Fast3dApi,
  args: GenerateFromPathArguments | GenerateFromBase64Arguments,
  normalize: () => Promise<ServiceResult<NormalizedInput>> | ServiceResult<NormalizedInput>,
  signal?: AbortSignal
): Promise<ServiceResult<GenerationOutcome>> {
  // Local checks come first so an invalid request never costs credits
  const parameters = validateGenerationParameters(args);
  if (!parameters.ok) {
    return parameters;
  }

  const input = await normalize();
  if (!input.ok) {
    return input;
  }

  return runGeneration(api, input.data, parameters.data, signal);
}

/**
 * generate_3d_model: read the image from disk, write the GLB next to it
 * unless an output path is given.
 */
export async function generateModelFromPath(
  api: Fast3dApi,
  args: GenerateFromPathArguments,
  signal?: AbortSignal
): Promise<ServiceResult<GenerationOutcome>> {
  const result = await generate(api, args, () => normalizePathInput(args.image_path, args.output_path), signal);
  logFailure('generate_3d_model', result);
  return result;
}

export async function generateModelFromBase64(
  api: Fast3dApi,
  args: GenerateFromBase64Arguments,
  signal?: AbortSignal
): Promise<ServiceResult<GenerationOutcome>> {
  const result = await generate(
    api,
    args,
    () => normalizeBase64Input(args.image_base64, args.image_format, args.output_path),
    signal
  );
  logFailure('generate_3d_model_from_base64', result);
  return result;
}

export async function checkApiBalance(
  api: Fast3dApi,
  signal?: AbortSignal
): Promise<ServiceResult<BalanceResult>> {
  const response = await api.checkBalance(signal);
  if (!response.ok) {
    logFailure('check_api_balance', response);
    return response;
  }

  const result = translateBalanceResponse(response.data);
  logFailure('check_api_balance', result);
  return result;
}
