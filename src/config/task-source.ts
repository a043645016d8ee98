import { readFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '../recorder/errors.js';

/** Reads the task description once. The content is passed on as-is apart from trimming. */
export async function readTaskSource(path: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read task file ${path}: ${errorMessage(err)}`);
  }

  const task = content.trim();
  if (task.length === 0) {
    throw new ConfigError(`Task file ${path} is empty`);
  }
  return task;
}
