import sharp from 'sharp';
import { countTokens as countO200k } from 'gpt-tokenizer/model/gpt-4o';
import { countTokens as countCl100k } from 'gpt-tokenizer/encoding/cl100k_base';
import { errorMessage } from './Errors';
import { silentLogger, type Logger } from './Log';
import type { ImageDetail, Message } from './Message';

// Types
// -----

export interface TokenUsage {
  stepName: string;
  inStepPromptTokens: number;
  inStepCompletionTokens: number;
  inStepTotalTokens: number;
  totalPromptTokens: number;
  totalCompletionTokens: number;
  totalTokens: number;
}

// How one model family counts tokens. The framing constants are the per-message
// overhead and the reply priming that chat formats add around the raw text.
export interface TokenizerStrategy {
  encoding: 'o200k_base' | 'cl100k_base';
  countText: (text: string) => number;
  perMessage: number;
  perReply: number;
}

// USD per million tokens
export interface ModelPrice {
  prompt: number;
  completion: number;
}

// Constants
// ---------

const LOW_DETAIL_IMAGE_TOKENS = 85;
const IMAGE_TILE_TOKENS = 170;
const IMAGE_TILE_SIZE = 512;
const IMAGE_MAX_SIDE = 2048;
const IMAGE_SHORT_SIDE = 768;

const O200K: TokenizerStrategy = { encoding: 'o200k_base', countText: countO200k, perMessage: 4, perReply: 2 };
const CL100K: TokenizerStrategy = { encoding: 'cl100k_base', countText: countCl100k, perMessage: 4, perReply: 2 };

// Prefix-matched; the longest matching prefix wins
const MODEL_PRICES: Record<string, ModelPrice> = {
  'gpt-5':             { prompt: 1.25, completion: 10 },
  'gpt-5-mini':        { prompt: 0.25, completion: 2 },
  'gpt-4.1':           { prompt: 2,    completion: 8 },
  'gpt-4.1-mini':      { prompt: 0.4,  completion: 1.6 },
  'gpt-4o':            { prompt: 2.5,  completion: 10 },
  'gpt-4o-mini':       { prompt: 0.15, completion: 0.6 },
  'gpt-4-turbo':       { prompt: 10,   completion: 30 },
  'gpt-4':             { prompt: 30,   completion: 60 },
  'gpt-3.5-turbo':     { prompt: 0.5,  completion: 1.5 },
  'o3':                { prompt: 2,    completion: 8 },
  'o4-mini':           { prompt: 1.1,  completion: 4.4 },
  'claude-sonnet-4':   { prompt: 3,    completion: 15 },
  'claude-opus-4':     { prompt: 15,   completion: 75 },
  'claude-3-5-haiku':  { prompt: 0.8,  completion: 4 },
  'gemini-2.5-pro':    { prompt: 1.25, completion: 10 },
  'gemini-2.5-flash':  { prompt: 0.3,  completion: 2.5 },
  'grok-4':            { prompt: 3,    completion: 15 },
};

// Strategy
// --------

// Picks the vocabulary for a model name; unknown families use cl100k_base
export function tokenizerStrategy(modelName: string): TokenizerStrategy {
  var name = modelName.toLowerCase();
  if (/^(gpt-4o|gpt-4\.1|gpt-5|o\d)/.test(name)) {
    return O200K;
  }
  return CL100K;
}

export function modelPrice(modelName: string): ModelPrice | undefined {
  var name = modelName.toLowerCase();
  var best: string | undefined;
  for (var prefix of Object.keys(MODEL_PRICES)) {
    if (name.startsWith(prefix) && (best === undefined || prefix.length > best.length)) {
      best = prefix;
    }
  }
  return best === undefined ? undefined : MODEL_PRICES[best];
}

// Images
// ------

// Extracts the base64 payload of a data URI, or of a bare base64 string
function base64Payload(url: string): string | null {
  var match = /^data:[^,]*;base64,(.*)$/s.exec(url);
  if (match) {
    return match[1];
  }
  if (/^[a-z][a-z0-9+.-]*:/i.test(url)) {
    return null;
  }
  return url;
}

// Tile-based cost of a high-detail image of the given size
export function imageTileTokens(width: number, height: number): number {
  var scale = Math.min(IMAGE_MAX_SIDE / Math.max(width, height), 1);
  var w = Math.trunc(width * scale);
  var h = Math.trunc(height * scale);

  var shortest = Math.min(w, h);
  if (shortest > IMAGE_SHORT_SIDE) {
    var resize = IMAGE_SHORT_SIDE / shortest;
    w = Math.trunc(w * resize);
    h = Math.trunc(h * resize);
  }

  var tiles = Math.ceil(w / IMAGE_TILE_SIZE) * Math.ceil(h / IMAGE_TILE_SIZE);
  return IMAGE_TILE_TOKENS * tiles + LOW_DETAIL_IMAGE_TOKENS;
}

// Tokenizer
// ---------

export class Tokenizer {
  readonly modelName: string;
  readonly strategy: TokenizerStrategy;

  constructor(modelName: string, strategy: TokenizerStrategy = tokenizerStrategy(modelName)) {
    this.modelName = modelName;
    this.strategy = strategy;
  }

  numTokens(text: string): number {
    return this.strategy.countText(text);
  }

  // Remote URLs cannot be measured without fetching them, so they are charged as low detail
  async numTokensForImage(url: string, detail: ImageDetail = 'high'): Promise<number> {
    if (detail === 'low') {
      return LOW_DETAIL_IMAGE_TOKENS;
    }
    var payload = base64Payload(url);
    if (payload === null) {
      return LOW_DETAIL_IMAGE_TOKENS;
    }
    var { width, height } = await sharp(Buffer.from(payload, 'base64')).metadata();
    if (!width || !height) {
      throw new Error('Unable to read image dimensions');
    }
    return imageTileTokens(width, height);
  }

  async numTokensFromMessages(messages: readonly Message[]): Promise<number> {
    var total = 0;
    for (var message of messages) {
      total += this.strategy.perMessage;
      if (typeof message.content === 'string') {
        total += this.numTokens(message.content);
      } else {
        for (var part of message.content) {
          if (part.type === 'text') {
            total += this.numTokens(part.text);
          } else {
            total += await this.numTokensForImage(part.image_url.url, part.image_url.detail);
          }
        }
      }
      total += this.strategy.perReply;
    }
    return total;
  }
}

// Ledger
// ------

const CSV_HEADER = 'step_name,prompt_tokens_in_step,completion_tokens_in_step,total_tokens_in_step,total_prompt_tokens,total_completion_tokens,total_tokens';

/** Append-only record of the tokens each conversation step consumed. */
export class TokenUsageLog {
  readonly modelName: string;
  private readonly tokenizer: Tokenizer;
  private readonly logger: Logger;
  private readonly entries: TokenUsage[] = [];
  private promptTokens = 0;
  private completionTokens = 0;

  constructor(modelName: string, logger: Logger = silentLogger) {
    this.modelName = modelName;
    this.tokenizer = new Tokenizer(modelName);
    this.logger = logger;
  }

  async update(messages: readonly Message[], answer: string, stepName: string): Promise<TokenUsage> {
    var prompt = await this.tokenizer.numTokensFromMessages(messages);
    var completion = this.tokenizer.numTokens(answer);
    this.promptTokens += prompt;
    this.completionTokens += completion;

    var entry: TokenUsage = {
      stepName,
      inStepPromptTokens: prompt,
      inStepCompletionTokens: completion,
      inStepTotalTokens: prompt + completion,
      totalPromptTokens: this.promptTokens,
      totalCompletionTokens: this.completionTokens,
      totalTokens: this.promptTokens + this.completionTokens,
    };
    this.entries.push(entry);
    this.logger.debug(`${stepName}: ${prompt} prompt + ${completion} completion tokens`);
    return entry;
  }

  log(): TokenUsage[] {
    return [...this.entries];
  }

  formatLog(): string {
    var rows = this.entries.map(e => [
      e.stepName,
      e.inStepPromptTokens,
      e.inStepCompletionTokens,
      e.inStepTotalTokens,
      e.totalPromptTokens,
      e.totalCompletionTokens,
      e.totalTokens,
    ].join(','));
    return [CSV_HEADER, ...rows].join('\n') + '\n';
  }

  totalTokens(): number {
    return this.promptTokens + this.completionTokens;
  }

  hasPricing(): boolean {
    return modelPrice(this.modelName) !== undefined;
  }

  // Cost in USD of the whole ledger, or null when the model has no known prices
  usageCost(): number | null {
    try {
      var price = modelPrice(this.modelName);
      if (!price) {
        return null;
      }
      return (this.promptTokens * price.prompt + this.completionTokens * price.completion) / 1_000_000;
    } catch (error) {
      this.logger.error(`Error while computing usage cost: ${errorMessage(error)}`);
      return null;
    }
  }
}
