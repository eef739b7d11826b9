import * as path from 'path';
import { fileURLToPath } from 'url';

// Project metadata lives beside the generated code
export const META_DATA_REL_PATH = '.scaffold';
export const MEMORY_REL_PATH = path.join(META_DATA_REL_PATH, 'memory');

export const CODE_GEN_LOG_FILE = 'all_output.txt';
export const IMPROVE_LOG_FILE = 'improve.txt';
export const ENTRYPOINT_LOG_FILE = 'gen_entrypoint_chat.txt';
export const TOKEN_USAGE_LOG_FILE = 'token_usage.csv';

export const ENTRYPOINT_FILE = 'run.sh';

// Packaged prompt templates
export const PREPROMPTS_PATH = fileURLToPath(new URL('./preprompts', import.meta.url));

export function memoryPath(projectPath: string): string {
  return path.join(projectPath, MEMORY_REL_PATH);
}
