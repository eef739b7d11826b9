import { z } from 'zod';

// Types
// -----

export type Role = 'system' | 'user' | 'assistant';
export type ImageDetail = 'low' | 'high';

export type TextPart = { type: 'text'; text: string };
export type ImagePart = { type: 'image_url'; image_url: { url: string; detail: ImageDetail } };
export type ContentPart = TextPart | ImagePart;
export type MessageContent = string | ContentPart[];

export interface Message {
  readonly role: Role;
  readonly content: MessageContent;
}

// Constructors
// ------------

export function systemMessage(content: string): Message {
  return { role: 'system', content };
}

export function userMessage(content: MessageContent): Message {
  return { role: 'user', content };
}

export function assistantMessage(content: string): Message {
  return { role: 'assistant', content };
}

// Content
// -------

// Returns the plain text of a message: the string itself, or the first text part
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  var first = content.find((part): part is TextPart => part.type === 'text');
  return first ? first.text : '';
}

// Splits a base64 data URI into its media type and payload
export function parseDataUri(url: string): { mimeType: string; data: string } | null {
  var match = /^data:([^;,]+);base64,(.*)$/s.exec(url);
  return match ? { mimeType: match[1], data: match[2] } : null;
}

// Merges every run of same-role messages into one, joining texts with a blank line.
// Multi-part contents are reduced to their first text part, so images are dropped.
export function collapseMessages(messages: readonly Message[]): Message[] {
  var collapsed: Message[] = [];
  if (messages.length === 0) {
    return collapsed;
  }

  var role = messages[0].role;
  var text = messageText(messages[0].content);
  for (var message of messages.slice(1)) {
    if (message.role === role) {
      text += '\n\n' + messageText(message.content);
    } else {
      collapsed.push({ role, content: text });
      role = message.role;
      text = messageText(message.content);
    }
  }
  collapsed.push({ role, content: text });
  return collapsed;
}

// Logging
// -------

// Renders a transcript as [ROLE] blocks for log files
export function formatMessages(messages: readonly Message[]): string {
  return messages.map(message => {
    var body = typeof message.content === 'string'
      ? message.content
      : message.content.map(part =>
          part.type === 'text' ? part.text : `[image ${part.image_url.detail}]`
        ).join('\n');
    return `[${message.role.toUpperCase()}]\n${body}`;
  }).join('\n\n');
}

// Serialization
// -------------

const ContentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('image_url'),
    image_url: z.object({ url: z.string(), detail: z.enum(['low', 'high']) }),
  }),
]);

const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.array(ContentPartSchema)]),
});

export function serializeMessages(messages: readonly Message[]): string {
  return JSON.stringify(messages);
}

// Parses a transcript written by serializeMessages; throws a ZodError on malformed input
export function deserializeMessages(json: string): Message[] {
  return z.array(MessageSchema).parse(JSON.parse(json));
}
