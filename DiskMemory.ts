import fs from 'fs/promises';
import path from 'path';
import { PathEscapeError } from './Errors';
import codeExtensions from './data/code-extensions.json';

// Key-value storage where keys are relative paths
export interface Memory {
  contains(key: string): Promise<boolean>;
  get(key: string): Promise<string>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
  log(key: string, text: string): Promise<void>;
  archiveLogs(): Promise<void>;
}

const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

const CODE_EXTENSIONS = new Set(codeExtensions);

// Resolves `key` under `root`, refusing anything that lands outside it
export function resolveInside(root: string, key: string): string {
  const full = path.resolve(root, key);
  const rel = path.relative(root, full);
  if (key.startsWith('../') || rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) {
    throw new PathEscapeError(key);
  }
  return full;
}

// Formats a date as YYYY-MM-DD-HH-MM-SS in local time
function archiveStamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  const d = date;
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}-${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`;
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/** Recursively lists files under `dir`, relative to `root`. */
async function listFiles(dir: string, root: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath, root)));
    } else if (entry.isFile()) {
      files.push(path.relative(root, fullPath));
    }
  }
  return files;
}

/**
 * A directory used as a key-value store: each key is a file path relative to
 * the root, each value the file's text. Images come back as data URIs so they
 * can go straight into a prompt.
 */
export class DiskMemory implements Memory {
  readonly path: string;

  constructor(root: string) {
    this.path = path.resolve(root);
  }

  async contains(key: string): Promise<boolean> {
    return isFile(path.join(this.path, key));
  }

  async get(key: string): Promise<string> {
    const full = path.join(this.path, key);
    if (!(await isFile(full))) {
      throw new Error(`File '${key}' could not be found in '${this.path}'`);
    }
    const mimeType = IMAGE_TYPES[path.extname(full).toLowerCase()];
    if (mimeType) {
      const bytes = await fs.readFile(full);
      return `data:${mimeType};base64,${bytes.toString('base64')}`;
    }
    return fs.readFile(full, 'utf8');
  }

  async set(key: string, value: string): Promise<void> {
    const full = resolveInside(this.path, key);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, value, 'utf8');
  }

  // Removes a file or a whole directory
  async delete(key: string): Promise<void> {
    const full = resolveInside(this.path, key);
    try {
      await fs.stat(full);
    } catch {
      throw new Error(`Item '${key}' could not be found in '${this.path}'`);
    }
    await fs.rm(full, { recursive: true, force: true });
  }

  async keys(): Promise<string[]> {
    try {
      return (await listFiles(this.path, this.path)).sort();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  // Appends a timestamped entry to logs/<key>
  async log(key: string, text: string): Promise<void> {
    const full = resolveInside(path.join(this.path, 'logs'), key);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.appendFile(full, `\n${new Date().toISOString()}\n${text}\n`, 'utf8');
  }

  // Moves logs/ aside as logs_<timestamp>/
  async archiveLogs(): Promise<void> {
    const logs = path.join(this.path, 'logs');
    try {
      await fs.stat(logs);
    } catch {
      return;
    }
    await fs.rename(logs, path.join(this.path, `logs_${archiveStamp(new Date())}`));
  }

  // One key per line; optionally only files with a known code extension
  async toPathListString(codeFilesOnly = false): Promise<string> {
    const keys = await this.keys();
    return keys
      .filter((key) => !codeFilesOnly || CODE_EXTENSIONS.has(path.extname(key)))
      .join('\n');
  }

  async toDict(): Promise<Record<string, string>> {
    const dict: Record<string, string> = {};
    for (const key of await this.keys()) {
      dict[key] = await this.get(key);
    }
    return dict;
  }

  async toJsonString(): Promise<string> {
    return JSON.stringify(await this.toDict(), null, 2);
  }
}
