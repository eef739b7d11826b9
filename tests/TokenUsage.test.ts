import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { assistantMessage, systemMessage, userMessage } from '../Message';
import { imageTileTokens, modelPrice, Tokenizer, tokenizerStrategy, TokenUsageLog } from '../TokenUsage';

describe('imageTileTokens', () => {
  it('counts 512px tiles after resizing', () => {
    expect(imageTileTokens(512, 512)).toBe(255);
    expect(imageTileTokens(1024, 1024)).toBe(765);
    expect(imageTileTokens(2048, 4096)).toBe(1105);
  });
});

describe('tokenizerStrategy', () => {
  it('picks the vocabulary by model family', () => {
    expect(tokenizerStrategy('gpt-4o-mini').encoding).toBe('o200k_base');
    expect(tokenizerStrategy('o3-mini').encoding).toBe('o200k_base');
    expect(tokenizerStrategy('gpt-4').encoding).toBe('cl100k_base');
    expect(tokenizerStrategy('claude-sonnet-4').encoding).toBe('cl100k_base');
  });
});

describe('Tokenizer', () => {
  const tokenizer = new Tokenizer('gpt-4o');

  it('charges low-detail and remote images the flat cost', async () => {
    expect(await tokenizer.numTokensForImage('data:image/png;base64,AQID', 'low')).toBe(85);
    expect(await tokenizer.numTokensForImage('https://example.com/cat.png', 'high')).toBe(85);
  });

  it('measures inline images', async () => {
    const png = await sharp({
      create: { width: 1024, height: 1024, channels: 3, background: { r: 255, g: 0, b: 0 } },
    }).png().toBuffer();
    const url = `data:image/png;base64,${png.toString('base64')}`;
    expect(await tokenizer.numTokensForImage(url, 'high')).toBe(765);
  });

  it('adds framing tokens around every message', async () => {
    expect(await tokenizer.numTokensFromMessages([systemMessage('')])).toBe(6);

    const text = await tokenizer.numTokensFromMessages([userMessage('hello'), assistantMessage('world')]);
    expect(text).toBe(12 + tokenizer.numTokens('hello') + tokenizer.numTokens('world'));

    const mixed = await tokenizer.numTokensFromMessages([
      userMessage([
        { type: 'text', text: 'hi' },
        { type: 'image_url', image_url: { url: 'https://example.com/a.png', detail: 'low' } },
      ]),
    ]);
    expect(mixed).toBe(6 + tokenizer.numTokens('hi') + 85);
  });
});

describe('TokenUsageLog', () => {
  it('keeps running totals equal to the sum of the steps', async () => {
    const log = new TokenUsageLog('gpt-4o');
    await log.update([systemMessage('You write code.'), userMessage('a snake game')], 'main.py\n```\n```', 'gen_code');
    await log.update([systemMessage('entry')], 'bash run.sh', 'gen_entrypoint');
    await log.update([userMessage('')], '', 'improve_fn');

    let prompt = 0;
    let completion = 0;
    let previous = 0;
    for (const entry of log.log()) {
      prompt += entry.inStepPromptTokens;
      completion += entry.inStepCompletionTokens;
      expect(entry.inStepTotalTokens).toBe(entry.inStepPromptTokens + entry.inStepCompletionTokens);
      expect(entry.totalPromptTokens).toBe(prompt);
      expect(entry.totalCompletionTokens).toBe(completion);
      expect(entry.totalTokens).toBeGreaterThanOrEqual(previous);
      previous = entry.totalTokens;
    }
    expect(log.totalTokens()).toBe(prompt + completion);
  });

  it('formats the ledger as CSV', async () => {
    const log = new TokenUsageLog('gpt-4o');
    await log.update([userMessage('')], '', 'gen_code');
    expect(log.formatLog()).toBe(
      'step_name,prompt_tokens_in_step,completion_tokens_in_step,total_tokens_in_step,total_prompt_tokens,total_completion_tokens,total_tokens\n'
      + 'gen_code,6,0,6,6,0,6\n',
    );
  });

  it('returns a copy of the ledger', async () => {
    const log = new TokenUsageLog('gpt-4o');
    await log.update([userMessage('')], '', 'gen_code');
    log.log().pop();
    expect(log.log()).toHaveLength(1);
  });

  it('prices known models and returns null otherwise', async () => {
    const priced = new TokenUsageLog('gpt-4o');
    await priced.update([userMessage('')], '', 'gen_code');
    expect(priced.hasPricing()).toBe(true);
    expect(priced.usageCost()).toBeCloseTo(0.000015, 10);

    const local = new TokenUsageLog('my-local-model');
    await local.update([userMessage('')], '', 'gen_code');
    expect(local.hasPricing()).toBe(false);
    expect(local.usageCost()).toBeNull();
  });

  it('matches the longest price prefix', () => {
    expect(modelPrice('gpt-4o-mini-2024-07-18')).toEqual({ prompt: 0.15, completion: 0.6 });
    expect(modelPrice('gpt-4o-2024-08-06')).toEqual({ prompt: 2.5, completion: 10 });
  });
});
