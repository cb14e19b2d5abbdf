// Text generation backends for the workout parser
// OpenAI Responses API by default, local Ollama as the alternative

import { z } from 'zod';
import type { LlmConfig } from './config.js';
import { UpstreamError, errorMessage } from './errors.js';

export interface TextGenerator {
  readonly model: string;
  generate(instructions: string, input: string): Promise<string>;
}

export type FetchFn = typeof fetch;

const openAiResponseSchema = z.object({
  output_text: z.string().optional(),
  output: z.array(z.object({
    type: z.string(),
    content: z.array(z.object({
      type: z.string(),
      text: z.string().optional()
    })).optional()
  })).optional(),
  error: z.object({ message: z.string() }).nullish()
});

const ollamaResponseSchema = z.object({
  response: z.string(),
  error: z.string().optional()
});

async function postJson(fetchFn: FetchFn, url: string, body: unknown, headers: Record<string, string>, timeoutMs: number, label: string): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs)
    });
  } catch (err) {
    throw new UpstreamError(`${label} request failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new UpstreamError(`${label} returned ${response.status}: ${text.slice(0, 200)}`);
  }

  try {
    return await response.json();
  } catch (err) {
    throw new UpstreamError(`${label} returned a non-JSON body`, { cause: err });
  }
}

export class OpenAiGenerator implements TextGenerator {
  constructor(
    private readonly config: Extract<LlmConfig, { provider: 'openai' }>,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  get model(): string {
    return this.config.model;
  }

  async generate(instructions: string, input: string): Promise<string> {
    const data = await postJson(
      this.fetchFn,
      `${this.config.baseUrl}/responses`,
      {
        model: this.config.model,
        reasoning: { effort: 'low' },
        instructions,
        input
      },
      { Authorization: `Bearer ${this.config.apiKey}` },
      this.config.timeoutMs,
      'OpenAI'
    );

    const parsed = openAiResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError('OpenAI returned an unexpected response shape');
    }
    if (parsed.data.error) {
      throw new UpstreamError(`OpenAI error: ${parsed.data.error.message}`);
    }

    // The REST payload has no output_text convenience field; collect the message parts
    const text = parsed.data.output_text ?? (parsed.data.output ?? [])
      .filter(item => item.type === 'message')
      .flatMap(item => item.content ?? [])
      .filter(part => part.type === 'output_text')
      .map(part => part.text ?? '')
      .join('');

    if (!text.trim()) {
      throw new UpstreamError(`OpenAI returned an empty response (model=${this.config.model})`);
    }
    return text.trim();
  }
}

export class OllamaGenerator implements TextGenerator {
  constructor(
    private readonly config: Extract<LlmConfig, { provider: 'ollama' }>,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  get model(): string {
    return this.config.model;
  }

  async generate(instructions: string, input: string): Promise<string> {
    const data = await postJson(
      this.fetchFn,
      `${this.config.url}/api/generate`,
      {
        model: this.config.model,
        system: instructions,
        prompt: input,
        format: 'json',
        stream: false
      },
      {},
      this.config.timeoutMs,
      'Ollama'
    );

    const parsed = ollamaResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError('Ollama returned an unexpected response shape');
    }
    if (parsed.data.error) {
      throw new UpstreamError(`Ollama error: ${parsed.data.error}`);
    }
    if (!parsed.data.response.trim()) {
      throw new UpstreamError(`Ollama returned an empty response (model=${this.config.model})`);
    }
    return parsed.data.response.trim();
  }
}

export function createGenerator(config: LlmConfig, fetchFn: FetchFn = fetch): TextGenerator {
  return config.provider === 'openai'
    ? new OpenAiGenerator(config, fetchFn)
    : new OllamaGenerator(config, fetchFn);
}
