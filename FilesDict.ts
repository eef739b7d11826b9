/**
 * A set of generated files: relative path to full content.
 *
 * Insertion order is kept so renderings are deterministic. Keys are not checked
 * for path escapes here; storage does that when the files are written.
 */
export class FilesDict extends Map<string, string> {
  constructor(entries: Iterable<readonly [string, string]> = []) {
    super();
    for (var [key, value] of entries) {
      this.set(key, value);
    }
  }

  static fromObject(record: Record<string, string>): FilesDict {
    return new FilesDict(Object.entries(record));
  }

  override set(key: string, value: string): this {
    if (typeof key !== 'string') {
      throw new TypeError('Keys must be strings');
    }
    if (typeof value !== 'string') {
      throw new TypeError('Values must be strings');
    }
    return super.set(key, value);
  }

  // Renders every file with 1-based line numbers inside one fenced block
  toChat(): string {
    var chat = '';
    for (var [name, content] of this) {
      chat += `File: ${name}\n`;
      content.split('\n').forEach((line, i) => {
        chat += `${i + 1} ${line}\n`;
      });
      chat += '\n';
    }
    return `\`\`\`\n${chat}\`\`\``;
  }

  toLog(): string {
    var log = '';
    for (var [name, content] of this) {
      log += `File: ${name}\n${content}\n`;
    }
    return log;
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this);
  }

  // Returns a new dict with `other`'s entries added after (and over) this one's
  merge(other: FilesDict): FilesDict {
    return new FilesDict([...this, ...other]);
  }
}
