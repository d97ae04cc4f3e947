import { z } from 'zod';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import {
  ModelProviderError,
  type CompletionRequest,
  type LanguageModel,
  type ModelProviderErrorKind,
  type ModelReply
} from './types.js';

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.union([z.string(), z.record(z.unknown())]).nullish()
                })
              })
            )
            .nullish()
        })
      })
    )
    .min(1)
});

const KIND_BY_STATUS: Record<number, ModelProviderErrorKind> = {
  402: 'insufficient_credits',
  404: 'model_not_found',
  429: 'rate_limited'
};

/**
 * Chat-completions client for OpenRouter. Returns the first choice; tool
 * call arguments are passed through as sent.
 */
export class OpenRouterModel implements LanguageModel {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: OpenRouterOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = (options.logger ?? silentLogger).child({ component: 'OpenRouterModel' });
  }

  async complete(request: CompletionRequest): Promise<ModelReply> {
    const timeoutMs = this.options.timeoutMs ?? 60000;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(`${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            authorization: `Bearer ${this.options.apiKey}`
          },
          body: JSON.stringify({
            model: this.options.model,
            messages: request.messages,
            ...(request.tools.length > 0 ? { tools: request.tools } : {})
          }),
          signal: controller.signal
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new ModelProviderError('timeout', `Model did not respond within ${timeoutMs}ms`, undefined, { cause: error });
        }
        throw new ModelProviderError('upstream', `Model request failed: ${error instanceof Error ? error.message : String(error)}`, undefined, {
          cause: error
        });
      }

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        const kind = KIND_BY_STATUS[response.status] ?? 'upstream';
        this.logger.warn({ status: response.status, kind }, 'model provider returned an error');
        throw new ModelProviderError(kind, `Model provider HTTP ${response.status}: ${text.slice(0, 300)}`, response.status);
      }

      const parsed = completionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ModelProviderError('upstream', 'Model provider returned an unexpected response shape', response.status);
      }

      const message = parsed.data.choices[0].message;
      return {
        content: message.content ?? null,
        toolCalls: (message.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments ?? {}
        }))
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
