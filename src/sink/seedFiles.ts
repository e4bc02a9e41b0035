import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createConfigurationError, createOutputError } from '../errors.js';
import { describeIssue, precheckLogSchema } from '../schemas.js';
import { PrecheckLog } from '../types.js';

export const PRECHECK_LOG_FILENAME = 'precheck.log.json';

export function seedFileName(name: string, extension: string): string {
  return `${name.replaceAll('.', '-')}.seeds.${extension}`;
}

/** Batch name as printed for downstream jobs: the file name without `.seeds.<ext>`. */
export function seedNameFromFile(fileName: string): string {
  return fileName.split('.seeds')[0];
}

export async function ensureOutputDir(directory: string): Promise<void> {
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw createOutputError(`Unable to create output directory "${directory}".`, { directory }, {
      cause: error,
    });
  }
}

export async function writeSeedFile(
  directory: string,
  name: string,
  extension: string,
  content: string,
): Promise<string> {
  const fileName = seedFileName(name, extension);
  await writeOutput(join(directory, fileName), content);
  return fileName;
}

export async function writePrecheckLog(path: string, log: PrecheckLog): Promise<string> {
  await writeOutput(path, JSON.stringify(log));
  return path;
}

export async function readPrecheckLog(path: string): Promise<PrecheckLog> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw createConfigurationError(`Unable to read precheck log "${path}".`, { path }, {
      cause: error,
    });
  }

  const result = precheckLogSchema.safeParse(parsed);
  if (!result.success) {
    const issue = describeIssue(result.error);
    throw createConfigurationError(
      `Precheck log "${path}" is invalid at "${issue.path}".`,
      { file: path, ...issue.details },
      { cause: result.error },
    );
  }

  return result.data;
}

async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf8');
  } catch (error) {
    throw createOutputError(`Unable to write "${path}".`, { path }, { cause: error });
  }
}
