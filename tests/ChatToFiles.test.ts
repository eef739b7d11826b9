import { describe, expect, it } from 'vitest';
import { applyDiffs, chatToEntrypoint, chatToFilesDict, parseDiffs, sanitizePath } from '../ChatToFiles';
import { FilesDict } from '../FilesDict';

describe('chatToFilesDict', () => {
  it('parses a path followed by a fenced block', () => {
    const files = chatToFilesDict('main.py\n```python\nprint(1)\n```\n');
    expect(files.toObject()).toEqual({ 'main.py': 'print(1)' });
  });

  it('strips brackets and a trailing colon from the path', () => {
    const files = chatToFilesDict('Here you go\n\n[src/app.js]:\n```\nconsole.log(1)\n```');
    expect([...files.keys()]).toEqual(['src/app.js']);
    expect(files.get('src/app.js')).toBe('console.log(1)');
  });

  it('keeps only the later block when a path repeats', () => {
    const files = chatToFilesDict('a.py\n```\nx = 1\n```\n\na.py\n```\nx = 2\n```\n');
    expect(files.size).toBe(1);
    expect(files.get('a.py')).toBe('x = 2');
  });

  it('unwraps backticks and allows indented fences with a language tag', () => {
    const files = chatToFilesDict('`lib/a.py`\n```\npass\n```\nsrc/util.ts\n  ```ts\nexport const x = 1;\n```');
    expect(files.toObject()).toEqual({ 'lib/a.py': 'pass', 'src/util.ts': 'export const x = 1;' });
  });

  it('keeps interior whitespace verbatim', () => {
    const files = chatToFilesDict('app.py\n```\n\ndef f():\n    return 1\n\n\nf()\n\n```');
    expect(files.get('app.py')).toBe('def f():\n    return 1\n\n\nf()');
  });

  it('yields an empty file for an empty block', () => {
    expect(chatToFilesDict('empty.txt\n```\n\n```\n').toObject()).toEqual({ 'empty.txt': '' });
  });

  it('yields an empty file for a block with nothing between the fences', () => {
    expect(chatToFilesDict('e.txt\n```\n```\n').toObject()).toEqual({ 'e.txt': '' });
  });

  it('keeps the file that follows an empty block', () => {
    const files = chatToFilesDict('a.py\n```\n```\nb.py\n```\nx\n```\n');
    expect([...files]).toEqual([['a.py', ''], ['b.py', 'x']]);
  });

  it('ignores tokens without a block and unterminated fences', () => {
    expect(chatToFilesDict('notes.txt\nsome text\n').size).toBe(0);
    expect(chatToFilesDict('main.py\n```\nprint(1)\n').size).toBe(0);
    expect(chatToFilesDict('').size).toBe(0);
  });

  it('reparses files rendered as path plus fence', () => {
    const original = new FilesDict([
      ['src/main.py', 'print("hi")\nprint(2)'],
      ['README.md', '# Title'],
    ]);
    const chat = [...original].map(([name, content]) => `${name}\n\`\`\`\n${content}\n\`\`\`\n`).join('\n');
    expect(chatToFilesDict(chat).toObject()).toEqual(original.toObject());
  });
});

describe('sanitizePath', () => {
  it('cleans common decorations', () => {
    expect(sanitizePath('[src/app.js]:')).toBe('src/app.js');
    expect(sanitizePath('`main.py`')).toBe('main.py');
    expect(sanitizePath('file.py:')).toBe('file.py');
    expect(sanitizePath('a<b>"c"|d?*.py')).toBe('abcd.py');
  });

  it('is idempotent', () => {
    const inputs = ['[[a]]', 'a]]', '`[b.py]`:', ' c ', '"d?.txt"', '[`e`]', '', ':::', 'plain/path.ts', '[x]]:'];
    for (const input of inputs) {
      const once = sanitizePath(input);
      expect(sanitizePath(once)).toBe(once);
    }
  });
});

describe('chatToEntrypoint', () => {
  it('joins every fenced body with a newline', () => {
    const script = chatToEntrypoint('```bash\npip install x\n```\n\n```\npython main.py\n```');
    expect(script).toBe('pip install x\n\npython main.py\n');
  });

  it('keeps the command after an empty block', () => {
    expect(chatToEntrypoint('```bash\n```\n```\npython main.py\n```')).toBe('\npython main.py\n');
  });

  it('returns an empty script when there is no block', () => {
    expect(chatToEntrypoint('just run it')).toBe('');
  });
});

describe('diffs', () => {
  it('leaves files as they were', () => {
    const files = new FilesDict([['a.py', 'x=1']]);
    const diffs = parseDiffs('```diff\n--- a.py\n+++ a.py\n@@ -1 +1 @@\n-x=1\n+x=2\n```');
    expect(diffs.size).toBe(0);
    const applied = applyDiffs(diffs, files);
    expect(applied).not.toBe(files);
    expect(applied.toObject()).toEqual({ 'a.py': 'x=1' });
  });
});
