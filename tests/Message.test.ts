import { describe, expect, it } from 'vitest';
import {
  assistantMessage,
  collapseMessages,
  deserializeMessages,
  formatMessages,
  messageText,
  serializeMessages,
  systemMessage,
  userMessage,
  type Message,
} from '../Message';

const IMAGE = { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID', detail: 'low' } } as const;

describe('collapseMessages', () => {
  const transcript: Message[] = [
    systemMessage('a'),
    userMessage('b'),
    userMessage('c'),
    assistantMessage('d'),
    userMessage('e'),
  ];

  it('joins same-role runs with a blank line', () => {
    expect(collapseMessages(transcript)).toEqual([
      systemMessage('a'),
      userMessage('b\n\nc'),
      assistantMessage('d'),
      userMessage('e'),
    ]);
  });

  it('is idempotent', () => {
    const once = collapseMessages(transcript);
    expect(collapseMessages(once)).toEqual(once);
  });

  it('keeps only the first text part of multi-part content', () => {
    const collapsed = collapseMessages([
      userMessage([IMAGE, { type: 'text', text: 'hello' }, { type: 'text', text: 'world' }]),
      userMessage([IMAGE]),
    ]);
    expect(collapsed).toEqual([userMessage('hello\n\n')]);
  });

  it('returns nothing for an empty transcript', () => {
    expect(collapseMessages([])).toEqual([]);
  });
});

describe('messageText', () => {
  it('reads strings and the first text part', () => {
    expect(messageText('plain')).toBe('plain');
    expect(messageText([IMAGE, { type: 'text', text: 'caption' }])).toBe('caption');
    expect(messageText([IMAGE])).toBe('');
  });
});

describe('formatMessages', () => {
  it('renders role blocks with image markers', () => {
    const text = formatMessages([systemMessage('s'), userMessage([{ type: 'text', text: 'q' }, IMAGE])]);
    expect(text).toBe('[SYSTEM]\ns\n\n[USER]\nq\n[image low]');
  });
});

describe('transcript serialization', () => {
  it('reads back what it writes', () => {
    const transcript = [systemMessage('s'), userMessage([{ type: 'text', text: 'q' }, IMAGE]), assistantMessage('a')];
    expect(deserializeMessages(serializeMessages(transcript))).toEqual(transcript);
  });

  it('rejects unknown roles', () => {
    expect(() => deserializeMessages('[{"role":"tool","content":"x"}]')).toThrow();
  });
});
