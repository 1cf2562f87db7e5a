export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type CompletionOptions = {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
};

export interface ChatModel {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export type ChatClientConfig = {
  /** Base URL of an OpenAI-compatible API, e.g. `https://host/v1`. */
  url: string;
  model: string;
  apiKey?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstChoiceContent(payload: unknown): string | undefined {
  if (!isRecord(payload) || !Array.isArray(payload.choices) || payload.choices.length === 0) {
    return undefined;
  }
  const choice: unknown = payload.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return undefined;
  }
  return typeof choice.message.content === "string" ? choice.message.content : undefined;
}

/** Chat-completion client for OpenAI-compatible endpoints. */
export class ChatClient implements ChatModel {
  constructor(
    private readonly config: ChatClientConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await this.fetchImpl(`${this.config.url.replace(/\/+$/, "")}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: this.config.model,
        messages,
        temperature: options.temperature ?? 0.2,
        max_tokens: options.maxTokens ?? 1500,
        response_format: { type: "json_object" },
        stream: false
      }),
      signal: options.signal
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`model request failed (${response.status}): ${body.slice(0, 200)}`);
    }

    const content = firstChoiceContent(await response.json());
    if (content === undefined) {
      throw new Error("model response has no message content");
    }
    return content;
  }
}
