#!/usr/bin/env -S npx tsx

// Scaffold.ts
// ===========
// Generates a codebase from a natural-language prompt, or revises one.
//
// Usage:
//   scaffold my_project               # reads my_project/prompt
//   scaffold my_project -i            # improve the files already there
//   scaffold my_project -m s --execute
//
// Generated files are written into the project directory, together with a
// run.sh entrypoint. Transcripts and token usage go to .scaffold/memory/logs.

// Imports
// -------

import * as fs from 'fs/promises';
import * as path from 'path';
import * as readline from 'readline/promises';
import { Command } from 'commander';
import { SimpleAgent } from './Agent';
import { loadConfig, DEFAULT_MODEL, DEFAULT_PROMPT_FILE, DEFAULT_TEMPERATURE, type CliOptions, type ScaffoldConfig } from './Config';
import { Conversation } from './Conversation';
import { DiskMemory } from './DiskMemory';
import { errorMessage, fail } from './Errors';
import { DiskExecutionEnv } from './ExecutionEnv';
import { formatModelSpec, GenAI, resolveModelSpec } from './GenAI';
import { ENTRYPOINT_FILE, memoryPath, TOKEN_USAGE_LOG_FILE } from './Paths';
import { Prompt } from './Prompt';

// Prompt
// ------

// Asks on the terminal when no prompt file exists
async function askPrompt(question: string): Promise<string> {
  var rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

// Reads the prompt file (plain text, or a .json Prompt) or asks for one
async function loadPrompt(config: ScaffoldConfig): Promise<Prompt> {
  var input = new DiskMemory(config.projectPath);
  var file = config.promptFile;
  var stat = await fs.stat(path.join(config.projectPath, file)).catch(() => null);
  if (stat?.isDirectory()) {
    fail(`The prompt path ${file} is a directory; pass a file with --prompt-file`);
  }

  if (await input.contains(file)) {
    var text = await input.get(file);
    config.logger.info(`Using prompt from file: ${file}`);
    return file.endsWith('.json') ? Prompt.fromJSON(text) : new Prompt(text);
  }

  var question = config.improve
    ? '\nHow do you want to improve the application?\n'
    : '\nWhat application do you want to generate?\n';
  var answer = await askPrompt(question);
  if (!answer) {
    fail('No prompt given.');
  }
  return new Prompt(answer);
}

// CLI
// ---

function parseCli(argv: string[]): ScaffoldConfig {
  var program = new Command();
  program
    .name('scaffold')
    .description('Generate or improve a codebase from a natural-language prompt')
    .argument('[project_path]', 'Project directory', '.')
    .option('-m, --model <spec>', `Model spec or alias (default: $MODEL_NAME or ${DEFAULT_MODEL})`)
    .option('-t, --temperature <num>', 'Sampling temperature', String(DEFAULT_TEMPERATURE))
    .option('-i, --improve', 'Improve the files already in the project')
    .option('--include <globs...>', 'Only send matching files when improving')
    .option('--prompt-file <path>', 'Prompt file, relative to the project', DEFAULT_PROMPT_FILE)
    .option('--no-stream', 'Do not echo the model output while it arrives')
    .option('--execute', `Run ${ENTRYPOINT_FILE} after generation`)
    .option('--timeout <sec>', 'Time limit for --execute')
    .option('-v, --verbose', 'Print transcripts and debug output')
    .parse(argv);

  var options = program.opts<CliOptions>();
  return loadConfig(program.args[0], options);
}

// Main
// ----

async function main(): Promise<void> {
  var config = parseCli(process.argv);
  var logger = config.logger;
  logger.info(`Running scaffold in ${config.projectPath}`);

  var prompt = await loadPrompt(config);

  var memory = new DiskMemory(memoryPath(config.projectPath));
  await memory.archiveLogs();

  logger.info(`Model: ${formatModelSpec(resolveModelSpec(config.model))}`);
  var model = await GenAI(config.model, {
    temperature: config.temperature,
    stream: config.stream,
    logger,
  });
  var ai = new Conversation({ model, logger });
  var agent = new SimpleAgent({
    memory,
    executionEnv: await DiskExecutionEnv.create(config.projectPath, logger),
    ai,
  });

  var files = config.improve
    ? await agent.improve(await agent.executionEnv.download({ include: config.include }), prompt)
    : await agent.init(prompt);
  await agent.executionEnv.upload(files);
  await memory.log(TOKEN_USAGE_LOG_FILE, ai.tokenUsageLog.formatLog());

  var cost = ai.tokenUsageLog.usageCost();
  if (cost !== null) {
    logger.info(`Total api cost: $ ${cost.toFixed(4)}`);
  } else {
    logger.info(`Total tokens used: ${ai.tokenUsageLog.totalTokens()}`);
  }
  logger.info(`Files written to: ${config.projectPath}`);

  if (config.execute) {
    if (!files.has(ENTRYPOINT_FILE)) {
      fail(`No ${ENTRYPOINT_FILE} to execute.`);
    }
    var result = await agent.executionEnv.run(`bash ${ENTRYPOINT_FILE}`, { timeoutMs: config.timeoutMs, echo: true });
    if (result.timedOut) {
      logger.warn(`${ENTRYPOINT_FILE} was stopped after ${config.timeoutMs} ms`);
    } else {
      logger.info(`${ENTRYPOINT_FILE} exited with code ${result.code}`);
    }
  }
}

main().catch(error => {
  console.error(`[scaffold] Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
