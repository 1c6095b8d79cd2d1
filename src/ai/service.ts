/**
 * AI Service Implementation
 *
 * One completion interface over Anthropic, OpenAI and Gemini, plus an offline
 * mock provider. `generateTests` is the text-in, text-out call the test
 * regenerator depends on.
 */

import { GenerationError } from "../lib/errors.js";

import type {
  AIConfig,
  AIProvider,
  AIResponse,
  CompletionRequest,
} from "./types.js";

export const DEFAULT_MODELS: Record<AIProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o-mini",
  gemini: "gemini-2.0-flash-lite",
  mock: "mock-model",
};

export const API_KEY_ENV_VARS: Record<Exclude<AIProvider, "mock">, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GOOGLE_API_KEY",
};

const PROVIDER_ENDPOINTS: Record<Exclude<AIProvider, "mock">, string> = {
  anthropic: "https://api.anthropic.com/v1/messages",
  openai: "https://api.openai.com/v1/chat/completions",
  gemini: "https://generativelanguage.googleapis.com/v1beta/models",
};

const DEFAULT_CONFIG: Required<AIConfig> = {
  provider: "anthropic",
  apiKey: "",
  model: DEFAULT_MODELS.anthropic,
  maxTokens: 4096,
  temperature: 0.3,
  timeoutMs: 120000,
};

export const TEST_SYSTEM_PROMPT = [
  "You are a Python testing expert.",
  "Generate minimal, readable pytest tests.",
  "Output ONLY code. No markdown fences. No explanations.",
].join(" ");

interface ProviderReply {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
}

/**
 * AI Service for generating completions
 */
export class AIService {
  private readonly config: Required<AIConfig>;

  constructor(config: Partial<AIConfig> = {}) {
    const provider = config.provider ?? DEFAULT_CONFIG.provider;
    this.config = {
      provider,
      apiKey: config.apiKey ?? this.getApiKeyFromEnv(provider),
      model: config.model ?? DEFAULT_MODELS[provider],
      maxTokens: config.maxTokens ?? DEFAULT_CONFIG.maxTokens,
      temperature: config.temperature ?? DEFAULT_CONFIG.temperature,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };
  }

  private getApiKeyFromEnv(provider: AIProvider): string {
    if (provider === "mock") return "mock-key";
    return process.env[API_KEY_ENV_VARS[provider]] ?? "";
  }

  /**
   * Check if the service is configured with an API key
   */
  isConfigured(): boolean {
    return this.config.provider === "mock" || this.config.apiKey.length > 0;
  }

  getProvider(): AIProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Generate a completion. Failures come back in the response, never thrown.
   */
  async complete(request: CompletionRequest): Promise<AIResponse<string>> {
    const startTime = Date.now();
    const provider = this.config.provider;

    if (provider === "mock") {
      return this.mockComplete(request, startTime);
    }

    if (!this.isConfigured()) {
      return {
        success: false,
        error: `API key not configured for ${provider}. Set the ${API_KEY_ENV_VARS[provider]} environment variable.`,
        durationMs: Date.now() - startTime,
      };
    }

    try {
      const response = await this.callProvider(provider, request);
      return {
        success: true,
        data: response.content,
        usage: response.usage,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const aborted = error instanceof Error && error.name === "AbortError";
      return {
        success: false,
        error: aborted
          ? `${provider} request timed out after ${this.config.timeoutMs}ms`
          : error instanceof Error ? error.message : "Unknown error",
        durationMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Generate pytest code for a prompt, throwing GenerationError on failure
   */
  async generateTests(prompt: string): Promise<string> {
    const response = await this.complete({
      systemPrompt: TEST_SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
    });

    if (!response.success || response.data === undefined) {
      throw new GenerationError(response.error ?? "No response data", {
        provider: this.config.provider,
        model: this.config.model,
      });
    }

    return response.data;
  }

  private async callProvider(
    provider: Exclude<AIProvider, "mock">,
    request: CompletionRequest
  ): Promise<ProviderReply> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      switch (provider) {
        case "anthropic":
          return await this.callAnthropic(request, controller.signal);
        case "openai":
          return await this.callOpenAI(request, controller.signal);
        case "gemini":
          return await this.callGemini(request, controller.signal);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private async callAnthropic(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const response = await fetch(PROVIDER_ENDPOINTS.anthropic, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: request.systemPrompt,
        messages: request.messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Anthropic API error: ${response.status} - ${error}`);
    }

    const data = (await response.json()) as {
      content: Array<{ text: string }>;
      usage: { input_tokens: number; output_tokens: number };
    };

    return {
      content: data.content[0]?.text ?? "",
      usage: {
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
      },
    };
  }

  private async callOpenAI(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const messages: Array<{ role: string; content: string }> = [];

    if (request.systemPrompt !== undefined && request.systemPrompt.length > 0) {
      messages.push({ role: "system", content: request.systemPrompt });
    }

    for (const m of request.messages) {
      messages.push({ role: m.role, content: m.content });
    }

    const response = await fetch(PROVIDER_ENDPOINTS.openai, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        messages,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${error}`);
    }

    const data = (await response.json()) as {
      choices: Array<{ message: { content: string | null } }>;
      usage: { prompt_tokens: number; completion_tokens: number };
    };

    return {
      content: data.choices[0]?.message.content ?? "",
      usage: {
        inputTokens: data.usage.prompt_tokens,
        outputTokens: data.usage.completion_tokens,
      },
    };
  }

  private async callGemini(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const url = `${PROVIDER_ENDPOINTS.gemini}/${encodeURIComponent(this.config.model)}:generateContent`;

    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": this.config.apiKey,
      },
      body: JSON.stringify({
        ...(request.systemPrompt
          ? { systemInstruction: { parts: [{ text: request.systemPrompt }] } }
          : {}),
        contents: request.messages.map((m) => ({
          role: m.role === "assistant" ? "model" : "user",
          parts: [{ text: m.content }],
        })),
        generationConfig: {
          temperature: request.temperature ?? this.config.temperature,
          maxOutputTokens: request.maxTokens ?? this.config.maxTokens,
        },
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Gemini API error: ${response.status} - ${error}`);
    }

    const data = (await response.json()) as {
      candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
      usageMetadata?: { promptTokenCount?: number; candidatesTokenCount?: number };
    };

    const parts = data.candidates?.[0]?.content?.parts ?? [];
    return {
      content: parts.map((part) => part.text ?? "").join(""),
      usage: {
        inputTokens: data.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: data.usageMetadata?.candidatesTokenCount ?? 0,
      },
    };
  }

  /**
   * Offline provider: one smoke test per requested function, fenced the way
   * real models often answer despite instructions.
   */
  private mockComplete(request: CompletionRequest, startTime: number): AIResponse<string> {
    const lastMessage = request.messages[request.messages.length - 1];
    const content = lastMessage?.content ?? "";

    const listed = /^Functions to test: (.+)$/m.exec(content)?.[1];
    const names = listed ? listed.split(",").map((name) => name.trim()).filter(Boolean) : [];

    const tests = names.length > 0
      ? names.map((name) => `def test_${name}():\n    assert ${name}() is not None`)
      : ["def test_module_imports():\n    assert True"];

    return {
      success: true,
      data: ["```python", tests.join("\n\n\n"), "```"].join("\n"),
      usage: { inputTokens: 100, outputTokens: 50 },
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Create an AI service instance
 */
export function createAIService(config?: Partial<AIConfig>): AIService {
  return new AIService(config);
}
