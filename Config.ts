import path from 'path';
import { z } from 'zod';
import { createLogger, type Logger } from './Log';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_PROMPT_FILE = 'prompt';

// Options as commander hands them over
export type CliOptions = {
  model?: string;
  temperature?: string;
  improve?: boolean;
  include?: string[];
  promptFile?: string;
  stream?: boolean;
  execute?: boolean;
  timeout?: string;
  verbose?: boolean;
};

export interface ScaffoldConfig {
  projectPath: string;
  model: string;
  temperature: number;
  improve: boolean;
  include?: string[];
  promptFile: string;
  stream: boolean;
  execute: boolean;
  timeoutMs?: number;
  verbose: boolean;
  logger: Logger;
}

const OptionsSchema = z.object({
  model: z.string().min(1),
  temperature: z.coerce.number().min(0).max(2),
  improve: z.boolean(),
  include: z.array(z.string().min(1)).optional(),
  promptFile: z.string().min(1),
  stream: z.boolean(),
  execute: z.boolean(),
  timeout: z.coerce.number().positive().optional(),
  verbose: z.boolean(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
}

// Merges CLI options over environment defaults. MODEL_NAME picks the model
// when --model is absent.
export function loadConfig(
  projectPath: string | undefined,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): ScaffoldConfig {
  var parsed = OptionsSchema.safeParse({
    model: options.model ?? env.MODEL_NAME ?? DEFAULT_MODEL,
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    improve: options.improve ?? false,
    include: options.include,
    promptFile: options.promptFile ?? DEFAULT_PROMPT_FILE,
    stream: options.stream ?? true,
    execute: options.execute ?? false,
    timeout: options.timeout,
    verbose: options.verbose ?? false,
  });
  if (!parsed.success) {
    throw new Error(`Invalid options: ${describeIssues(parsed.error)}`);
  }

  var data = parsed.data;
  return {
    projectPath: path.resolve(projectPath ?? '.'),
    model: data.model,
    temperature: data.temperature,
    improve: data.improve,
    include: data.include,
    promptFile: data.promptFile,
    stream: data.stream,
    execute: data.execute,
    timeoutMs: data.timeout === undefined ? undefined : data.timeout * 1000,
    verbose: data.verbose,
    logger: createLogger({ verbose: data.verbose }),
  };
}
