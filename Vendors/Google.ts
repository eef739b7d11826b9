import { GoogleGenAI, type Content, type GenerateContentConfig, type Part } from "@google/genai";
import type { ChatModel, ThinkingLevel, VendorSettings } from "../GenAI";
import { rethrowVendorError } from "../Errors";
import { assistantMessage, messageText, parseDataUri, type Message } from "../Message";
import type { Logger } from "../Log";

const MAX_OUTPUT_TOKENS = 65536;

function thinkingBudget(thinking: ThinkingLevel): number | undefined {
  if (thinking === "auto") {
    return undefined;
  }
  if (thinking === "none") {
    return 0;
  }
  return thinking === "low" ? 2048 : thinking === "medium" ? 4096 : 8192;
}

function toParts(message: Message): Part[] {
  if (typeof message.content === "string") {
    return [{ text: message.content }];
  }
  return message.content.map((part): Part => {
    if (part.type === "text") {
      return { text: part.text };
    }
    const image = parseDataUri(part.image_url.url);
    return image
      ? { inlineData: { mimeType: image.mimeType, data: image.data } }
      : { text: `Image: ${part.image_url.url}` };
  });
}

export class GoogleChat implements ChatModel {
  readonly vendor = "google" as const;
  readonly model: string;
  readonly vision: boolean;
  private readonly client: GoogleGenAI;
  private readonly baseConfig: GenerateContentConfig;
  private readonly stream: boolean;
  private readonly logger: Logger;

  constructor(settings: VendorSettings) {
    this.client = new GoogleGenAI({ apiKey: settings.apiKey });
    this.model = settings.model;
    this.vision = settings.vision;
    this.stream = settings.stream;
    this.logger = settings.logger;

    const config: GenerateContentConfig = {
      maxOutputTokens: settings.maxTokens ?? MAX_OUTPUT_TOKENS,
    };
    if (typeof settings.temperature === "number") {
      config.temperature = settings.temperature;
    }
    const budget = thinkingBudget(settings.thinking);
    if (budget !== undefined) {
      config.thinkingConfig = { thinkingBudget: budget, includeThoughts: false };
    }
    this.baseConfig = config;
  }

  async invoke(messages: readonly Message[]): Promise<Message> {
    const config: GenerateContentConfig = { ...this.baseConfig };
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => messageText(m.content))
      .join("\n\n");
    if (system) {
      config.systemInstruction = system;
    }

    const contents: Content[] = messages
      .filter((m) => m.role !== "system")
      .map((m) => ({
        role: m.role === "assistant" ? "model" : "user",
        parts: toParts(m),
      }));

    this.logger.debug(`google:${this.model} <- ${contents.length} messages`);
    try {
      const visible = this.stream
        ? await this.invokeStreaming(contents, config)
        : await this.invokeOnce(contents, config);
      return assistantMessage(visible);
    } catch (error) {
      rethrowVendorError(this.vendor, error);
    }
  }

  private async invokeOnce(contents: Content[], config: GenerateContentConfig): Promise<string> {
    const response = await this.client.models.generateContent({ model: this.model, contents, config });
    return response.text ?? "";
  }

  private async invokeStreaming(contents: Content[], config: GenerateContentConfig): Promise<string> {
    const stream = await this.client.models.generateContentStream({ model: this.model, contents, config });
    let visible = "";
    for await (const chunk of stream) {
      const text = chunk.text;
      if (text) {
        process.stdout.write(text);
        visible += text;
      }
    }
    process.stdout.write("\n");
    return visible;
  }
}
