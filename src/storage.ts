import { constants as fsConstants, promises as fs, type Stats } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, failure, success, type ServiceResult } from './errors.js';

const DIRECTORY_PERMISSIONS = 0o755;
const FILE_PERMISSIONS = 0o644;

async function statIfExists(target: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Check that the model can be written to `outputPath` before a billed request
 * is sent. Nothing is created here: missing directories are made by
 * `writeModelFile`, so the nearest existing ancestor must be a writable
 * directory.
 */
export async function prepareOutputPath(outputPath: string): Promise<ServiceResult<string>> {
  const target = path.resolve(outputPath);
  const directory = path.dirname(target);

  try {
    const stats = await statIfExists(target);
    if (stats?.isDirectory()) {
      return failure('InvalidInput', `Output path is a directory: ${outputPath}`);
    }

    let ancestor = directory;
    let ancestorStats = await statIfExists(ancestor);
    while (ancestorStats === undefined && path.dirname(ancestor) !== ancestor) {
      ancestor = path.dirname(ancestor);
      ancestorStats = await statIfExists(ancestor);
    }
    if (!ancestorStats?.isDirectory()) {
      return failure('InvalidInput', `Cannot create output directory ${directory}: ${ancestor} is not a directory`);
    }

    await fs.access(ancestor, fsConstants.W_OK);
  } catch (error: unknown) {
    return failure('InvalidInput', `Output directory is not writable: ${directory} (${errorMessage(error)})`);
  }

  return success(outputPath);
}

/**
 * Write the model next to its destination under a temporary name, then rename
 * it into place. Readers never see a partially written file at `outputPath`.
 */
export async function writeModelFile(outputPath: string, data: Buffer): Promise<number> {
  const directory = path.dirname(path.resolve(outputPath));
  await fs.mkdir(directory, { recursive: true, mode: DIRECTORY_PERMISSIONS });

  const tempPath = path.join(directory, `.${path.basename(outputPath)}.${uuidv4()}.tmp`);
  try {
    await fs.writeFile(tempPath, data, { mode: FILE_PERMISSIONS });
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return data.length;
}
