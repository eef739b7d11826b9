import Anthropic from "@anthropic-ai/sdk";
import type { ChatModel, ThinkingLevel, VendorSettings } from "../GenAI";
import { rethrowVendorError } from "../Errors";
import { assistantMessage, messageText, parseDataUri, type Message } from "../Message";
import type { Logger } from "../Log";

type Role = "user" | "assistant";
type Block = Anthropic.Messages.TextBlockParam | Anthropic.Messages.ImageBlockParam;

const DEFAULT_MAX_TOKENS = 8192;
const MIN_THINKING_BUDGET = 1024;
const MIN_ANSWER_RESERVE = 2048;
const MEDIA_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"] as const;

type MediaType = (typeof MEDIA_TYPES)[number];

function isMediaType(mimeType: string): mimeType is MediaType {
  return MEDIA_TYPES.some((type) => type === mimeType);
}

function thinkingBudget(thinking: ThinkingLevel): number | undefined {
  if (thinking === "none" || thinking === "auto") {
    return undefined;
  }
  return thinking === "low" ? 2048 : thinking === "medium" ? 4096 : 8192;
}

// Only inline base64 images are sent; anything else is described in text
function toBlocks(message: Message): string | Block[] {
  if (typeof message.content === "string") {
    return message.content;
  }
  return message.content.map((part): Block => {
    if (part.type === "text") {
      return { type: "text", text: part.text };
    }
    const image = parseDataUri(part.image_url.url);
    if (image && isMediaType(image.mimeType)) {
      return {
        type: "image",
        source: { type: "base64", media_type: image.mimeType, data: image.data },
      };
    }
    return { type: "text", text: `Image: ${part.image_url.url}` };
  });
}

export class AnthropicChat implements ChatModel {
  readonly vendor = "anthropic" as const;
  readonly model: string;
  readonly vision: boolean;
  private readonly client: Anthropic;
  private readonly temperature?: number;
  private readonly maxTokens: number;
  private readonly stream: boolean;
  private readonly budget?: number;
  private readonly logger: Logger;

  constructor(settings: VendorSettings) {
    this.client = new Anthropic({ apiKey: settings.apiKey, baseURL: settings.baseURL });
    this.model = settings.model;
    this.vision = settings.vision;
    this.temperature = settings.temperature;
    this.maxTokens = settings.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.stream = settings.stream;
    this.budget = thinkingBudget(settings.thinking);
    this.logger = settings.logger;
  }

  async invoke(messages: readonly Message[]): Promise<Message> {
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => messageText(m.content))
      .join("\n\n");
    const turns: Anthropic.Messages.MessageParam[] = [];
    for (const message of messages) {
      if (message.role === "system") continue;
      const role: Role = message.role;
      turns.push({ role, content: toBlocks(message) });
    }

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: turns,
    };
    if (system) {
      params.system = system;
    }

    if (this.budget !== undefined) {
      const maxAllowed = Math.max(MIN_THINKING_BUDGET, this.maxTokens - MIN_ANSWER_RESERVE);
      params.thinking = {
        type: "enabled",
        budget_tokens: Math.min(Math.max(MIN_THINKING_BUDGET, this.budget), maxAllowed),
      };
    } else if (typeof this.temperature === "number") {
      params.temperature = this.temperature;
    }

    this.logger.debug(`anthropic:${this.model} <- ${turns.length} messages`);
    try {
      const plain = this.stream
        ? await this.invokeStreaming(params)
        : await this.invokeOnce(params);
      return assistantMessage(plain);
    } catch (error) {
      rethrowVendorError(this.vendor, error);
    }
  }

  private async invokeOnce(params: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<string> {
    const message = await this.client.messages.create(params);
    let plain = "";
    for (const block of message.content) {
      if (block.type === "text") {
        plain += block.text;
      }
    }
    return plain;
  }

  private async invokeStreaming(params: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<string> {
    const stream = await this.client.messages.create({ ...params, stream: true });
    let plain = "";
    for await (const event of stream) {
      if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
        process.stdout.write(event.delta.text);
        plain += event.delta.text;
      }
    }
    process.stdout.write("\n");
    return plain;
  }
}
