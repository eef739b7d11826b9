import { DiskMemory, type Memory } from './DiskMemory';
import { MissingTemplateError } from './Errors';
import { PREPROMPTS_PATH } from './Paths';

export type PrepromptName =
  | 'roadmap'
  | 'generate'
  | 'improve'
  | 'philosophy'
  | 'entrypoint'
  | 'file_format'
  | 'file_format_diff';

// Holds the prompt templates the steps are built from
export class Preprompts {
  private readonly memory: Memory;
  private readonly source: string;

  constructor(memory: Memory, source: string) {
    this.memory = memory;
    this.source = source;
  }

  // Reads templates from a directory, the packaged one by default
  static fromPath(dir: string = PREPROMPTS_PATH): Preprompts {
    return new Preprompts(new DiskMemory(dir), dir);
  }

  async get(name: PrepromptName): Promise<string> {
    if (!(await this.memory.contains(name))) {
      throw new MissingTemplateError(name, this.source);
    }
    return this.memory.get(name);
  }
}
