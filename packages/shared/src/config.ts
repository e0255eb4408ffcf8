/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The model service credential is read here but only the worker entrypoint
 * passes it on; the parser receives it explicitly at construction.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  metricsPort: number;

  // LLM
  llmApiKey: string;
  llmBaseUrl: string;
  llmModel: string;
  llmTemperature: number;
  llmMaxTokens: number;
  llmRequestTimeoutMs: number;
  maxPromptChars: number;

  // Text acquisition
  legibilityThreshold: number;
  ocrDpi: number;
  ocrLanguage: string;
  tesseractCacheDir: string;

  // Insights
  currencySymbol: string;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),

  // LLM
  llmApiKey: process.env.LLM_API_KEY || process.env.GROQ_API_KEY || '',
  llmBaseUrl: process.env.LLM_BASE_URL || 'https://api.groq.com/openai/v1',
  llmModel: process.env.LLM_MODEL || 'llama-3.1-8b-instant',
  llmTemperature: parseFloat(process.env.LLM_TEMPERATURE || '0.2'),
  llmMaxTokens: parseInt(process.env.LLM_MAX_TOKENS || '1024', 10),
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  maxPromptChars: parseInt(process.env.MAX_PROMPT_CHARS || '7000', 10),

  // Text acquisition
  legibilityThreshold: parseInt(process.env.LEGIBILITY_THRESHOLD || '40', 10),
  ocrDpi: parseInt(process.env.OCR_DPI || '300', 10),
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  tesseractCacheDir: process.env.TESSERACT_CACHE_DIR || '',

  // Insights
  currencySymbol: process.env.INSIGHT_CURRENCY_SYMBOL || '$',
};
