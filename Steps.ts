// Steps.ts
// ========
// The model exchanges behind `init` and `improve`. Each step builds its
// transcript from the templates, runs it through the conversation, logs it to
// memory, and parses the last reply.

import { applyDiffs, chatToEntrypoint, chatToFilesDict, parseDiffs } from './ChatToFiles';
import type { Conversation } from './Conversation';
import type { Memory } from './DiskMemory';
import { FilesDict } from './FilesDict';
import { formatMessages, messageText, systemMessage, userMessage, type Message } from './Message';
import { CODE_GEN_LOG_FILE, ENTRYPOINT_FILE, ENTRYPOINT_LOG_FILE, IMPROVE_LOG_FILE } from './Paths';
import type { Preprompts } from './Preprompts';
import type { Prompt } from './Prompt';

export const DEFAULT_ENTRYPOINT_PROMPT = `
Make a unix script that
a) installs dependencies
b) runs all necessary parts of the codebase (in parallel if necessary)
`;

// Helpers
// -------

// Text of the last message, trimmed
function lastReply(messages: readonly Message[]): string {
  var last = messages.at(-1);
  return last ? messageText(last.content).trim() : '';
}

async function composeSystemPrompt(preprompts: Preprompts, body: 'generate' | 'improve', format: 'file_format' | 'file_format_diff'): Promise<string> {
  var roadmap = await preprompts.get('roadmap');
  var template = await preprompts.get(body);
  var fileFormat = await preprompts.get(format);
  var philosophy = await preprompts.get('philosophy');
  return roadmap + template.replaceAll('FILE_FORMAT', () => fileFormat) + '\nUseful to know:\n' + philosophy;
}

// System prompts
// --------------

export function setupSysPrompt(preprompts: Preprompts): Promise<string> {
  return composeSystemPrompt(preprompts, 'generate', 'file_format');
}

export function setupSysPromptExistingCode(preprompts: Preprompts): Promise<string> {
  return composeSystemPrompt(preprompts, 'improve', 'file_format_diff');
}

// Steps
// -----

// Asks for the whole codebase and parses it out of the reply
export async function genCode(ai: Conversation, prompt: Prompt, memory: Memory, preprompts: Preprompts): Promise<FilesDict> {
  var messages = await ai.start(await setupSysPrompt(preprompts), prompt.toContent(), 'gen_code');
  await memory.log(CODE_GEN_LOG_FILE, formatMessages(messages));
  return chatToFilesDict(lastReply(messages));
}

// Asks for a script that installs and runs the generated files
export async function genEntrypoint(
  ai: Conversation,
  prompt: Prompt,
  files: FilesDict,
  memory: Memory,
  preprompts: Preprompts,
): Promise<FilesDict> {
  var request = prompt.entrypointPrompt || DEFAULT_ENTRYPOINT_PROMPT;
  var messages = await ai.start(
    await preprompts.get('entrypoint'),
    request + '\nInformation about the codebase:\n\n' + files.toChat(),
    'gen_entrypoint',
  );
  await memory.log(ENTRYPOINT_LOG_FILE, formatMessages(messages));
  return new FilesDict([[ENTRYPOINT_FILE, chatToEntrypoint(lastReply(messages))]]);
}

// Asks for diffs against the current files. Diffs are not applied yet, so the
// files come back as they were.
export async function improveFn(
  ai: Conversation,
  prompt: Prompt,
  files: FilesDict,
  memory: Memory,
  preprompts: Preprompts,
): Promise<FilesDict> {
  var transcript = [
    systemMessage(await setupSysPromptExistingCode(preprompts)),
    userMessage(files.toChat()),
    userMessage(prompt.toContent()),
  ];
  var messages = await ai.next(transcript, undefined, 'improve_fn');
  await memory.log(IMPROVE_LOG_FILE, formatMessages(messages));
  return applyDiffs(parseDiffs(lastReply(messages)), files);
}
