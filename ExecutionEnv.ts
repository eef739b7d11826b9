import { spawn, type ChildProcess } from 'child_process';
import { FileStore, type PullOptions } from './FileStore';
import type { FilesDict } from './FilesDict';
import { silentLogger, type Logger } from './Log';

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  // Mirrors output to this process's stdout/stderr as it arrives
  echo?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  // null when the process was killed by a signal
  code: number | null;
  timedOut: boolean;
}

// A place where generated code can be written and run
export interface ExecutionEnv {
  upload(files: FilesDict): Promise<this>;
  download(options?: PullOptions): Promise<FilesDict>;
  popen(command: string): ChildProcess;
  run(command: string, options?: RunOptions): Promise<RunResult>;
}

export const KILL_GRACE_MS = 2000;

// Signals the whole process group so children of the shell go too
function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
      throw error;
    }
  }
}

/** Runs shell commands inside a FileStore's working directory. */
export class DiskExecutionEnv implements ExecutionEnv {
  readonly files: FileStore;
  private readonly logger: Logger;

  constructor(files: FileStore, logger: Logger = silentLogger) {
    this.files = files;
    this.logger = logger;
  }

  static async create(dir?: string, logger?: Logger): Promise<DiskExecutionEnv> {
    return new DiskExecutionEnv(await FileStore.create(dir), logger);
  }

  async upload(files: FilesDict): Promise<this> {
    await this.files.push(files);
    return this;
  }

  async download(options?: PullOptions): Promise<FilesDict> {
    return this.files.pull(options);
  }

  popen(command: string): ChildProcess {
    return spawn(command, {
      shell: true,
      cwd: this.files.workingDir,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
  }

  // Runs to completion, or until the timeout/abort, returning whatever was captured
  run(command: string, options: RunOptions = {}): Promise<RunResult> {
    const { timeoutMs, signal, echo = false } = options;
    this.logger.info(`$ ${command}`);

    return new Promise((resolve, reject) => {
      const child = this.popen(command);
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let graceTimer: NodeJS.Timeout | undefined;

      const stop = () => {
        killGroup(child, 'SIGTERM');
        graceTimer = setTimeout(() => killGroup(child, 'SIGKILL'), KILL_GRACE_MS);
      };

      const timer = timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            this.logger.warn(`Timed out after ${timeoutMs} ms`);
            stop();
          }, timeoutMs);

      const onAbort = () => {
        this.logger.warn('Execution aborted');
        stop();
      };
      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
        if (echo) process.stdout.write(chunk);
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
        if (echo) process.stderr.write(chunk);
      });

      const cleanup = () => {
        clearTimeout(timer);
        clearTimeout(graceTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.on('error', (error) => {
        cleanup();
        reject(error);
      });
      child.on('close', (code) => {
        cleanup();
        resolve({ stdout, stderr, code, timedOut });
      });
    });
  }
}
