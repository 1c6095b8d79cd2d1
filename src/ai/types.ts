/**
 * AI Service Types
 */

export const AI_PROVIDERS = ["anthropic", "openai", "gemini", "mock"] as const;

export type AIProvider = (typeof AI_PROVIDERS)[number];

export interface AIConfig {
  /** AI provider to use */
  provider: AIProvider;
  /** API key (reads from env if not provided) */
  apiKey?: string;
  /** Model to use (provider-specific) */
  model?: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature (0-1) */
  temperature?: number;
  /** Timeout in milliseconds */
  timeoutMs?: number;
}

export interface AIResponse<T = string> {
  /** Whether the request succeeded */
  success: boolean;
  /** Response data */
  data?: T;
  /** Error message if failed */
  error?: string;
  /** Usage statistics */
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Response time in ms */
  durationMs: number;
}

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}
