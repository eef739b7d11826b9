// ChatToFiles.ts
// ==============
// Turns a free-text model reply into files.
//
// A file is a path token on its own line followed by a fenced block:
//
//   src/main.py
//   ```python
//   print(1)
//   ```
//
// Nothing here validates paths against escapes; storage does that on write.

import { FilesDict } from './FilesDict';

// Patterns
// --------

const FILE_BLOCK = /(\S+)\n\s*```[^\n]*\n(.*?)```/gs;
const FENCED_BODY = /```\S*\n(.*?)```/gs;

// Sanitation
// ----------

// Runs one pass of path cleanup, in order
function sanitizeOnce(raw: string): string {
  var path = raw.replace(/[:<>"|?*]/g, '');
  path = path.replace(/^\[(.*)\]$/, '$1');
  path = path.replace(/^`(.*)`$/, '$1');
  path = path.replace(/[\]:]$/, '');
  return path.trim();
}

// Cleans a path token until it stops changing, so `[[a]]` and `a]]` settle too
export function sanitizePath(raw: string): string {
  var path = sanitizeOnce(raw);
  while (true) {
    var next = sanitizeOnce(path);
    if (next === path) {
      return path;
    }
    path = next;
  }
}

// Parsing
// -------

// Extracts every path+fence pair; later duplicates win
export function chatToFilesDict(chat: string): FilesDict {
  var files = new FilesDict();
  for (var match of chat.matchAll(FILE_BLOCK)) {
    files.set(sanitizePath(match[1]), match[2].trim());
  }
  return files;
}

// Extracts only fenced bodies and joins them into one script
export function chatToEntrypoint(chat: string): string {
  var bodies: string[] = [];
  for (var match of chat.matchAll(FENCED_BODY)) {
    bodies.push(match[1]);
  }
  return bodies.join('\n');
}

// Diffs
// -----
// Unified diffs are not applied yet: `improve` keeps files as they were.

export interface Diff {
  readonly filename: string;
  readonly hunks: readonly string[];
}

export function parseDiffs(_chat: string): Map<string, Diff> {
  return new Map();
}

export function applyDiffs(_diffs: ReadonlyMap<string, Diff>, files: FilesDict): FilesDict {
  return new FilesDict(files);
}
