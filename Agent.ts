import { Conversation } from './Conversation';
import { DiskMemory, type Memory } from './DiskMemory';
import { DiskExecutionEnv, type ExecutionEnv } from './ExecutionEnv';
import type { FilesDict } from './FilesDict';
import { GenAI } from './GenAI';
import { DEFAULT_MODEL } from './Config';
import { memoryPath } from './Paths';
import { Preprompts } from './Preprompts';
import type { Prompt } from './Prompt';
import { genCode, genEntrypoint, improveFn } from './Steps';

// What a caller drives: generate from scratch, or revise existing files
export interface Agent {
  init(prompt: Prompt): Promise<FilesDict>;
  improve(files: FilesDict, prompt: Prompt): Promise<FilesDict>;
}

export interface SimpleAgentOptions {
  memory: Memory;
  executionEnv: ExecutionEnv;
  ai: Conversation;
  preprompts?: Preprompts;
}

/**
 * Generates a codebase plus its `run.sh` on `init`, and sends files back to the
 * model on `improve`. Every exchange is logged to `memory`.
 */
export class SimpleAgent implements Agent {
  readonly memory: Memory;
  readonly executionEnv: ExecutionEnv;
  readonly ai: Conversation;
  readonly preprompts: Preprompts;

  constructor(options: SimpleAgentOptions) {
    this.memory = options.memory;
    this.executionEnv = options.executionEnv;
    this.ai = options.ai;
    this.preprompts = options.preprompts ?? Preprompts.fromPath();
  }

  // Memory under <projectPath>/.scaffold/memory, a temp execution dir, packaged templates
  static async withDefaultConfig(projectPath: string, ai?: Conversation, preprompts?: Preprompts): Promise<SimpleAgent> {
    return new SimpleAgent({
      memory: new DiskMemory(memoryPath(projectPath)),
      executionEnv: await DiskExecutionEnv.create(),
      ai: ai ?? new Conversation({ model: await GenAI(DEFAULT_MODEL) }),
      preprompts,
    });
  }

  async init(prompt: Prompt): Promise<FilesDict> {
    const files = await genCode(this.ai, prompt, this.memory, this.preprompts);
    const entrypoint = await genEntrypoint(this.ai, prompt, files, this.memory, this.preprompts);
    return files.merge(entrypoint);
  }

  async improve(files: FilesDict, prompt: Prompt): Promise<FilesDict> {
    return improveFn(this.ai, prompt, files, this.memory, this.preprompts);
  }
}
