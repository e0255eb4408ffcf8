/**
 * Model Invocation
 *
 * Sends the extraction prompt to an OpenAI-compatible chat-completion
 * service and returns the raw response text. One attempt per call: SDK
 * retries are disabled and failures are not retried here.
 */

import OpenAI from 'openai';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { config } from '../config';
import { ConfigurationError, UpstreamServiceError } from '../errors';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { ExtractionPrompt } from './request-builder';
import type { CompletionClient, CompletionRequest, CompletionResponse } from './types';

/**
 * Connection settings for the model service
 */
export interface CompletionClientOptions {
  apiKey: string;
  /** OpenAI-compatible endpoint */
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * CompletionClient backed by the openai SDK
 */
export class OpenAiCompletionClient implements CompletionClient {
  private readonly openai: OpenAI;

  constructor(options: CompletionClientOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || config.llmBaseUrl,
      timeout: options.timeoutMs || config.llmRequestTimeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.openai.chat.completions.create({
      model: request.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });

    return {
      content: response.choices[0]?.message?.content ?? null,
      requestId: response.id,
      totalTokens: response.usage?.total_tokens,
    };
  }
}

/**
 * Model invocation options
 */
export interface ModelInvocationOptions {
  /** Service credential; required even when a client is supplied */
  apiKey?: string;
  /** Prebuilt client (built from apiKey when omitted) */
  client?: CompletionClient;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Raw model output with request metadata
 */
export interface ModelResponse {
  rawText: string;
  model: string;
  requestId: string;
  durationMs: number;
}

/**
 * Throw ConfigurationError unless a usable credential is present
 */
export function requireApiKey(apiKey: string | undefined): string {
  if (!apiKey || !apiKey.trim()) {
    throw new ConfigurationError(
      'Model service API key not configured. Set LLM_API_KEY (or GROQ_API_KEY).'
    );
  }
  return apiKey;
}

/**
 * Debug: Write LLM prompts to temp folder for inspection
 */
function debugWritePrompts(prompt: ExtractionPrompt): void {
  if (!process.env.DEBUG_LLM_PROMPTS) return;

  const debugDir = process.env.DEBUG_LLM_PROMPTS_DIR || '/tmp/llm-debug';

  try {
    if (!fs.existsSync(debugDir)) {
      fs.mkdirSync(debugDir, { recursive: true });
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const filename = `${timestamp}_statement_prompt.txt`;

    fs.writeFileSync(
      path.join(debugDir, filename),
      `Template Version: ${prompt.templateVersion}\n` +
        `Text Length: ${prompt.textLength} chars (truncated: ${prompt.truncated})\n` +
        `${'='.repeat(80)}\n\n` +
        `${prompt.systemPrompt}\n\n${prompt.userPrompt}`
    );

    logger.info('Debug: wrote LLM prompt to disk', { debug_dir: debugDir, file: filename });
  } catch (err) {
    logger.warn('Debug: failed to write LLM prompt', { error: String(err) });
  }
}

/**
 * Send the prompt to the model service and return the raw completion text.
 *
 * @throws ConfigurationError when no API key is configured (before any network call)
 * @throws UpstreamServiceError on any transport or service failure
 */
export async function invokeModel(
  prompt: ExtractionPrompt,
  options: ModelInvocationOptions = {}
): Promise<ModelResponse> {
  const apiKey = requireApiKey(options.apiKey);
  const model = options.model || config.llmModel;
  const client =
    options.client ??
    new OpenAiCompletionClient({ apiKey, baseUrl: options.baseUrl, timeoutMs: options.timeoutMs });

  debugWritePrompts(prompt);

  logger.info('Querying model service', {
    model,
    template_version: prompt.templateVersion,
    text_length: prompt.textLength,
    truncated: prompt.truncated,
  });

  const startTime = Date.now();

  try {
    const response = await client.complete({
      model,
      systemPrompt: prompt.systemPrompt,
      userPrompt: prompt.userPrompt,
      temperature: options.temperature ?? config.llmTemperature,
      maxTokens: options.maxTokens ?? config.llmMaxTokens,
    });

    const durationMs = Date.now() - startTime;
    llmRequestDurationHistogram.observe({ model }, durationMs / 1000);
    llmRequestsCounter.inc({ model, status: 'success' });

    const rawText = response.content ?? '';
    const requestId = response.requestId || `req_${Date.now()}`;

    logger.info('Model response received', {
      model,
      request_id: requestId,
      duration_ms: durationMs,
      response_chars: rawText.length,
      tokens_used: response.totalTokens,
    });

    return { rawText, model, requestId, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    llmRequestDurationHistogram.observe({ model }, durationMs / 1000);
    llmRequestsCounter.inc({ model, status: 'error' });

    logger.error('Model service request failed', error, {
      model,
      duration_ms: durationMs,
    });

    throw new UpstreamServiceError(error, model);
  }
}
