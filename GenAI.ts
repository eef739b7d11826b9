import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AnthropicChat } from './Vendors/Anthropic';
import { GoogleChat } from './Vendors/Google';
import { OpenAIChat } from './Vendors/OpenAI';
import { errorMessage } from './Errors';
import { silentLogger, type Logger } from './Log';
import type { Message } from './Message';

export const MODELS: Record<string, string> = {
  // OpenAI
  'g-' : 'openai:gpt-4o-mini',
  'g'  : 'openai:gpt-4o',
  'g+' : 'openai:gpt-4.1',
  'G'  : 'openai:gpt-5:medium',

  // Anthropic Claude
  's'  : 'anthropic:claude-sonnet-4-5-20250929',
  'S'  : 'anthropic:claude-sonnet-4-5-20250929:high',
  'o'  : 'anthropic:claude-opus-4-1-20250805',
  'O'  : 'anthropic:claude-opus-4-1-20250805:high',

  // Google Gemini
  'i'  : 'google:gemini-2.5-pro',
  'I'  : 'google:gemini-2.5-pro:high',

  // xAI Grok
  'x'  : 'xai:grok-4-0709',
};

export type Vendor = 'openai' | 'anthropic' | 'google' | 'openrouter' | 'xai';
export type ThinkingLevel = 'none' | 'low' | 'medium' | 'high' | 'auto';

export interface ResolvedModelSpec {
  vendor: Vendor;
  model: string;
  thinking: ThinkingLevel;
}

/** A model backend: one stateless completion over a whole transcript. */
export interface ChatModel {
  readonly vendor: Vendor;
  readonly model: string;
  // Whether the backend accepts mixed text and image content
  readonly vision: boolean;
  invoke(messages: readonly Message[]): Promise<Message>;
}

export interface ChatModelOptions {
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
  thinking?: ThinkingLevel;
  vision?: boolean;
  apiKey?: string;
  baseURL?: string;
  logger?: Logger;
}

// Options each vendor constructor receives, after key and defaults are resolved
export interface VendorSettings {
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  stream: boolean;
  thinking: ThinkingLevel;
  vision: boolean;
  baseURL?: string;
  logger: Logger;
}

const SUPPORTED_VENDORS = new Set<string>(['openai', 'anthropic', 'google', 'openrouter', 'xai']);
const THINKING_LEVELS = new Set<string>(['none', 'low', 'medium', 'high', 'auto']);

// Vendor strategy table, resolved once when a model is constructed
const VENDORS: Record<Vendor, (settings: VendorSettings) => ChatModel> = {
  openai:     settings => new OpenAIChat('openai', settings, 'https://api.openai.com/v1'),
  openrouter: settings => new OpenAIChat('openrouter', settings, 'https://openrouter.ai/api/v1'),
  anthropic:  settings => new AnthropicChat(settings),
  google:     settings => new GoogleChat(settings),
  xai:        settings => new OpenAIChat('xai', settings, 'https://api.x.ai/v1'),
};

function isVendor(name: string): name is Vendor {
  return SUPPORTED_VENDORS.has(name);
}

function isThinkingLevel(name: string): name is ThinkingLevel {
  return THINKING_LEVELS.has(name);
}

function inferVendor(model: string): Vendor {
  const normalized = model.toLowerCase();
  if (normalized.startsWith('gpt') || /^o\d/.test(normalized)) {
    return 'openai';
  }
  if (normalized.startsWith('claude')) {
    return 'anthropic';
  }
  if (normalized.startsWith('gemini')) {
    return 'google';
  }
  if (normalized.startsWith('grok')) {
    return 'xai';
  }
  if (normalized.includes('/')) {
    return 'openrouter';
  }
  throw new Error(`Unsupported vendor for model "${model}"`);
}

// Models that take image parts next to text
export function supportsVision(model: string): boolean {
  const name = model.toLowerCase();
  return name.includes('vision-preview')
    || (name.includes('gpt-4-turbo') && !name.includes('preview'))
    || name.includes('gpt-4o')
    || name.includes('gpt-4.1')
    || name.includes('gpt-5')
    || name.includes('claude')
    || name.includes('gemini')
    || name.startsWith('grok-4');
}

export function resolveModelSpec(spec: string): ResolvedModelSpec {
  const trimmed = spec.trim();
  if (!trimmed) {
    throw new Error('Model spec must be provided');
  }

  const parts = trimmed.split(':');
  if (parts.length === 1) {
    const alias = MODELS[trimmed];
    if (alias) {
      return resolveModelSpec(alias);
    }
    return { model: trimmed, vendor: inferVendor(trimmed), thinking: 'auto' };
  }

  if (parts.length > 3) {
    throw new Error(
      `Expected "vendor:model" or "vendor:model:thinking", got "${spec}"`,
    );
  }

  const [vendorRaw, modelRaw, thinkingRaw] = parts;
  const vendor = vendorRaw.trim().toLowerCase();
  if (!isVendor(vendor)) {
    throw new Error(`Unsupported vendor: ${vendorRaw}`);
  }

  const model = modelRaw.trim();
  if (!model) {
    throw new Error('Model name must be provided after vendor');
  }

  let thinking: ThinkingLevel = 'auto';
  if (thinkingRaw !== undefined) {
    const normalized = thinkingRaw.trim().toLowerCase();
    if (!isThinkingLevel(normalized)) {
      throw new Error(
        `Unsupported thinking budget "${thinkingRaw}", expected one of none|low|medium|high|auto`,
      );
    }
    thinking = normalized;
  }

  return { vendor, model, thinking };
}

export function formatModelSpec(resolved: ResolvedModelSpec): string {
  return `${resolved.vendor}:${resolved.model}:${resolved.thinking}`;
}

// Looks up an API key: explicit option, then <VENDOR>_API_KEY, then ~/.config/<vendor>.token
export async function getToken(vendor: Vendor, explicit?: string): Promise<string> {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env[`${vendor.toUpperCase()}_API_KEY`];
  if (fromEnv) {
    return fromEnv;
  }
  const tokenPath = path.join(os.homedir(), '.config', `${vendor}.token`);
  try {
    return (await fs.readFile(tokenPath, 'utf8')).trim();
  } catch (err) {
    throw new Error(
      `No API key for ${vendor}: set ${vendor.toUpperCase()}_API_KEY or write ${tokenPath} (${errorMessage(err)})`,
    );
  }
}

export async function GenAI(modelSpec: string, options: ChatModelOptions = {}): Promise<ChatModel> {
  const resolved = resolveModelSpec(modelSpec);
  const apiKey = await getToken(resolved.vendor, options.apiKey);
  return VENDORS[resolved.vendor]({
    apiKey,
    model: resolved.model,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    stream: options.stream ?? false,
    thinking: options.thinking ?? resolved.thinking,
    vision: options.vision ?? supportsVision(resolved.model),
    baseURL: options.baseURL,
    logger: options.logger ?? silentLogger,
  });
}
