/**
 * Interface for LLM provider adapters (OpenAI today).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Model every request is sent to */
    readonly model: string;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The user message
     * @param params - Additional parameters (temperature, system prompt, etc.)
     * @returns The completion text, plus parsed JSON in JSON mode
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check if the provider can be called (e.g., an API key is configured).
     */
    isAvailable(): Promise<boolean>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
    /** System prompt */
    systemPrompt?: string;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Parsed JSON (set in json mode) */
    parsed?: unknown;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers like OpenAI) */
    apiKey?: string;
    /** Base URL (for custom or proxy endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
    /** Request timeout in milliseconds */
    timeoutMs?: number;
}
