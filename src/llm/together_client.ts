/**
 * Together AI completions client
 * https://docs.together.ai/reference/completions-1
 */

import { isPlainObject } from '@/utils/guards';
import { createChildLogger } from '@/utils/logger';
import { ProviderError } from '@/providers/types';

const logger = createChildLogger('together');

const COMPLETIONS_URL = 'https://api.together.xyz/v1/completions';

export interface CompletionParams {
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  topK: number;
  repetitionPenalty: number;
}

export interface CompletionClient {
  complete(prompt: string, params: CompletionParams): Promise<string>;
}

function readText(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Completion text from the response body. Accepts `choices[0].text`, an
 * `output` object with `text` or `content`, or a top-level `text`/`content`.
 */
export function extractCompletionText(body: unknown): string {
  if (!isPlainObject(body)) return '';

  if ('output' in body) {
    const output = body.output;
    if (isPlainObject(output)) {
      return readText(output.text) ?? readText(output.content) ?? '';
    }
    return output === null || output === undefined ? '' : String(output);
  }

  if (Array.isArray(body.choices)) {
    const [first] = body.choices;
    return isPlainObject(first) ? readText(first.text) ?? '' : '';
  }

  return readText(body.text) ?? readText(body.content) ?? '';
}

export class TogetherClient implements CompletionClient {
  constructor(private readonly apiKey: string) {}

  async complete(prompt: string, params: CompletionParams): Promise<string> {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: params.model,
        prompt,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        top_p: params.topP,
        top_k: params.topK,
        repetition_penalty: params.repetitionPenalty,
        stop: ['\n\n\n'],
      }),
    });

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new ProviderError(
        `Together API error: ${response.status} ${response.statusText} ${detail}`.trim(),
        'together',
        params.model,
        'completions',
        response.status
      );
    }

    const body: unknown = await response.json();
    if (isPlainObject(body)) {
      logger.info({ keys: Object.keys(body) }, 'Response received from Together API');
    }
    return extractCompletionText(body);
  }
}
