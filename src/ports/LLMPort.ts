export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Implementations throw `LLMError` with a classified reason on failure. */
export interface LLMPort {
  generateText(request: LLMRequest): Promise<LLMResponse>;
}
