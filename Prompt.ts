import { z } from 'zod';
import type { ContentPart } from './Message';

const PromptSchema = z.object({
  text: z.string(),
  image_urls: z.record(z.string()).nullable().optional(),
  entrypoint_prompt: z.string().default(''),
});

export type PromptJSON = z.input<typeof PromptSchema>;

// A user request, optionally with named images and a custom entrypoint request
export class Prompt {
  readonly text: string;
  readonly imageUrls?: Readonly<Record<string, string>>;
  readonly entrypointPrompt: string;

  constructor(text: string, imageUrls?: Record<string, string>, entrypointPrompt = '') {
    this.text = text;
    this.imageUrls = imageUrls ? { ...imageUrls } : undefined;
    this.entrypointPrompt = entrypointPrompt;
  }

  // Text part first, then each image at low detail
  toContent(): ContentPart[] {
    var content: ContentPart[] = [{ type: 'text', text: `Request: ${this.text}` }];
    for (var url of Object.values(this.imageUrls ?? {})) {
      content.push({ type: 'image_url', image_url: { url, detail: 'low' } });
    }
    return content;
  }

  toJSON(): PromptJSON {
    return {
      text: this.text,
      image_urls: this.imageUrls ? { ...this.imageUrls } : null,
      entrypoint_prompt: this.entrypointPrompt,
    };
  }

  static fromJSON(json: string): Prompt {
    var data = PromptSchema.parse(JSON.parse(json));
    return new Prompt(data.text, data.image_urls ?? undefined, data.entrypoint_prompt);
  }

  toString(): string {
    return `Prompt(text=${JSON.stringify(this.text)})`;
  }
}
