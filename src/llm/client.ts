import axios from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { config } from '../config.js';
import { addApiCallBreadcrumb } from '../utils/sentry.js';
import { ExternalServiceError } from '../errors/application-errors.js';

const OPENAI_URL = 'https://api.openai.com/v1/chat/completions';
const SERVICE = 'openai';

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  /** Name of the JSON schema sent as response_format */
  schemaName?: string;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

export function isLLMConfigured(): boolean {
  return Boolean(config.OPENAI_API_KEY);
}

/**
 * OpenAI chat completion with structured output.
 * The reply is parsed as JSON and validated against the zod schema.
 */
export async function callLLM<T>(
  messages: Message[],
  schema: z.ZodSchema<T>,
  jsonSchema: object,
  options: LLMOptions = {}
): Promise<T> {
  const { temperature = 0.1, maxTokens = 1500, timeoutMs = 30000, schemaName = 'response' } = options;

  if (!config.OPENAI_API_KEY) {
    throw new ExternalServiceError(SERVICE, 'OPENAI_API_KEY is not configured');
  }

  logger.info('LLM', `Calling ${config.OPENAI_MODEL}...`);
  logger.debug('LLM', 'Messages', { count: messages.length });
  addApiCallBreadcrumb(SERVICE, 'chat.completions', { model: config.OPENAI_MODEL });

  let content: string | null;
  try {
    const response = await axios.post<unknown>(
      OPENAI_URL,
      {
        model: config.OPENAI_MODEL,
        messages,
        temperature,
        max_tokens: maxTokens,
        response_format: {
          type: 'json_schema',
          json_schema: { name: schemaName, schema: jsonSchema },
        },
      },
      {
        timeout: timeoutMs,
        headers: {
          Authorization: `Bearer ${config.OPENAI_API_KEY}`,
          'Content-Type': 'application/json',
        },
      }
    );

    const completion = completionSchema.safeParse(response.data);
    if (!completion.success) {
      throw new ExternalServiceError(SERVICE, 'Unexpected completion payload');
    }
    content = completion.data.choices[0]?.message.content ?? null;
    if (completion.data.usage) {
      logger.debug('LLM', `Tokens used: ${completion.data.usage.total_tokens}`);
    }
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      logger.error('LLM', 'API error', { status, code: error.code });
      if (status === 429) {
        throw new ExternalServiceError(SERVICE, 'rate limit or quota exceeded', 60);
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        throw new ExternalServiceError(SERVICE, `request timed out after ${timeoutMs}ms`);
      }
      throw new ExternalServiceError(SERVICE, `API error ${status ?? error.code ?? 'unknown'}`);
    }
    throw error;
  }

  if (!content) {
    throw new ExternalServiceError(SERVICE, 'Empty response from LLM');
  }
  logger.debug('LLM', 'Raw response', content.substring(0, 300));

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    logger.error('LLM', 'Failed to parse JSON response', content);
    throw new ExternalServiceError(SERVICE, 'Invalid JSON from LLM');
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.error('LLM', 'Schema validation failed', result.error.format());
    throw new ExternalServiceError(SERVICE, `Schema validation failed: ${result.error.message}`);
  }

  logger.info('LLM', 'Response validated successfully');
  return result.data;
}
