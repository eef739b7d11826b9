import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import ignore from 'ignore';
import { minimatch } from 'minimatch';
import { resolveInside } from './DiskMemory';
import { FilesDict } from './FilesDict';
import { META_DATA_REL_PATH } from './Paths';

type Ignore = ReturnType<typeof ignore>;

export const BINARY_PLACEHOLDER = 'binary file';

export interface PullOptions {
  // Glob patterns a relative path must match one of; all files when omitted
  include?: string[];
}

// Checks the first 8 KB for NUL bytes
function isLikelyBinary(buf: Buffer): boolean {
  var sample = buf.subarray(0, Math.min(buf.length, 8192));
  return sample.includes(0);
}

async function loadGitignore(root: string): Promise<Ignore> {
  const ig = ignore().add(['.git', META_DATA_REL_PATH, 'node_modules']);
  try {
    ig.add(await fs.readFile(path.join(root, '.gitignore'), 'utf8'));
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
  return ig;
}

/** Recursively lists files, skipping ignored entries. Paths use forward slashes. */
async function listFiles(dir: string, ig: Ignore, root: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    const relativePath = path.relative(root, fullPath).split(path.sep).join('/');
    if (entry.isDirectory()) {
      if (ig.ignores(relativePath + '/')) continue;
      files.push(...(await listFiles(fullPath, ig, root)));
    } else if (entry.isFile()) {
      if (ig.ignores(relativePath)) continue;
      files.push(relativePath);
    }
  }
  return files;
}

// A working directory that generated files are pushed to and pulled from
export class FileStore {
  readonly workingDir: string;

  private constructor(workingDir: string) {
    this.workingDir = workingDir;
  }

  // Uses `dir` (created if needed) or a fresh temp directory
  static async create(dir?: string): Promise<FileStore> {
    const workingDir = dir
      ? path.resolve(dir)
      : await fs.mkdtemp(path.join(os.tmpdir(), 'scaffold-'));
    await fs.mkdir(workingDir, { recursive: true });
    return new FileStore(workingDir);
  }

  async push(files: FilesDict): Promise<this> {
    for (const [name, content] of files) {
      const full = resolveInside(this.workingDir, name);
      await fs.mkdir(path.dirname(full), { recursive: true });
      await fs.writeFile(full, content, 'utf8');
    }
    return this;
  }

  async pull(options: PullOptions = {}): Promise<FilesDict> {
    const ig = await loadGitignore(this.workingDir);
    const names = (await listFiles(this.workingDir, ig, this.workingDir)).sort();
    const include = options.include;
    const files = new FilesDict();
    for (const name of names) {
      if (include && !include.some((glob) => minimatch(name, glob, { dot: true }))) {
        continue;
      }
      const bytes = await fs.readFile(path.join(this.workingDir, name));
      files.set(name, isLikelyBinary(bytes) ? BINARY_PLACEHOLDER : bytes.toString('utf8'));
    }
    return files;
  }
}
