/**
 * @fileoverview Completion backend for prompt handlers
 *
 * Prompt handlers only need "send this text, get text back". The Anthropic
 * implementation is the default; tests and hosts can supply their own.
 */

import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../../infrastructure/logging/index.js';
import type { PromptSettings } from '../../infrastructure/settings/index.js';

const logger = createLogger('hooks:completion');

export interface CompletionRequest {
  system: string;
  prompt: string;
  model: string;
  maxTokens: number;
  signal: AbortSignal;
}

export interface CompletionBackend {
  /** Resolve to the model's text output; reject on any failure */
  complete(request: CompletionRequest): Promise<string>;
}

export interface AnthropicBackendConfig {
  apiKey: string;
  baseUrl?: string;
}

export class AnthropicCompletionBackend implements CompletionBackend {
  private readonly client: Anthropic;

  /**
   * @param client - Optional Anthropic client (for testing)
   */
  constructor(config: AnthropicBackendConfig, client?: Anthropic) {
    if (!config.apiKey || config.apiKey.trim() === '') {
      throw new Error('Prompt handlers require an Anthropic API key');
    }

    this.client = client ?? new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal }
    );

    const output = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');

    logger.debug('Completion received', {
      model: request.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      outputLength: output.length,
    });

    return output;
  }
}

/**
 * Build the default backend from the configured API key variable.
 * Returns undefined when no key is set; prompt rules then fail open.
 */
export function createCompletionBackendFromEnv(
  settings: PromptSettings,
  env: NodeJS.ProcessEnv = process.env
): CompletionBackend | undefined {
  const apiKey = env[settings.apiKeyEnvVar];
  if (!apiKey || apiKey.trim() === '') {
    logger.info('No completion API key configured; prompt rules will be skipped', {
      apiKeyEnvVar: settings.apiKeyEnvVar,
    });
    return undefined;
  }
  return new AnthropicCompletionBackend({ apiKey, baseUrl: settings.baseUrl });
}
