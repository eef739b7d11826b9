import OpenAI from "openai";
import type { ChatModel, ThinkingLevel, Vendor, VendorSettings } from "../GenAI";
import { rethrowVendorError } from "../Errors";
import { assistantMessage, messageText, type Message } from "../Message";
import type { Logger } from "../Log";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatPart = OpenAI.Chat.Completions.ChatCompletionContentPart;
type Effort = "low" | "medium" | "high";

// Reasoning models reject custom temperatures
function isReasoningModel(model: string): boolean {
  return /^o\d/.test(model) || model.startsWith("gpt-5");
}

function mapThinking(model: string, thinking: ThinkingLevel): Effort | undefined {
  if (!isReasoningModel(model) || thinking === "none" || thinking === "auto") {
    return undefined;
  }
  return thinking;
}

function toChatMessage(message: Message): ChatMessage {
  if (message.role === "system") {
    return { role: "system", content: messageText(message.content) };
  }
  if (message.role === "assistant") {
    return { role: "assistant", content: messageText(message.content) };
  }
  if (typeof message.content === "string") {
    return { role: "user", content: message.content };
  }
  const parts: ChatPart[] = message.content.map((part) =>
    part.type === "text"
      ? { type: "text", text: part.text }
      : { type: "image_url", image_url: { url: part.image_url.url, detail: part.image_url.detail } },
  );
  return { role: "user", content: parts };
}

/** Chat Completions backend; also serves OpenRouter and xAI through their compatible endpoints. */
export class OpenAIChat implements ChatModel {
  readonly vendor: Vendor;
  readonly model: string;
  readonly vision: boolean;
  private readonly client: OpenAI;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly stream: boolean;
  private readonly effort?: Effort;
  private readonly logger: Logger;

  constructor(vendor: Vendor, settings: VendorSettings, defaultBaseURL: string) {
    const defaultHeaders =
      vendor === "openrouter"
        ? { "X-Title": "scaffold" }
        : undefined;

    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL ?? defaultBaseURL,
      defaultHeaders,
    });
    this.vendor = vendor;
    this.model = settings.model;
    this.vision = settings.vision;
    this.temperature = isReasoningModel(settings.model) ? undefined : settings.temperature;
    this.maxTokens = settings.maxTokens;
    this.stream = settings.stream;
    this.effort = mapThinking(settings.model, settings.thinking);
    this.logger = settings.logger;
  }

  async invoke(messages: readonly Message[]): Promise<Message> {
    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toChatMessage),
    };
    if (typeof this.temperature === "number") {
      params.temperature = this.temperature;
    }
    if (typeof this.maxTokens === "number") {
      params.max_completion_tokens = this.maxTokens;
    }
    if (this.effort) {
      params.reasoning_effort = this.effort;
    }

    this.logger.debug(`${this.vendor}:${this.model} <- ${messages.length} messages`);
    try {
      const visible = this.stream
        ? await this.invokeStreaming(params)
        : await this.invokeOnce(params);
      return assistantMessage(visible);
    } catch (error) {
      rethrowVendorError(this.vendor, error);
    }
  }

  private async invokeOnce(
    params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
  ): Promise<string> {
    const resp = await this.client.chat.completions.create(params);
    return resp.choices[0]?.message?.content ?? "";
  }

  private async invokeStreaming(
    params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
  ): Promise<string> {
    const stream = await this.client.chat.completions.create({ ...params, stream: true });
    let visible = "";
    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) {
        process.stdout.write(delta);
        visible += delta;
      }
    }
    process.stdout.write("\n");
    return visible;
  }
}
