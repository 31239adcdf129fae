export type TurnRole = 'system' | 'user' | 'assistant';

export type Turn = {
  role: TurnRole;
  content: string;
};

/** One increment of a streamed completion; either fragment may be absent. */
export type StreamChunk = {
  content?: string;
  reasoning?: string;
};

export type StreamChatOptions = {
  model: string;
  /** Token budget for extended thinking; omitted when the endpoint rejected it. */
  reasoningBudget?: number;
  signal?: AbortSignal;
};

export interface ReasoningClient {
  /**
   * Opens a streaming completion. Rejects with an `AgentError` of kind
   * `unsupported_parameter` when the endpoint refuses a request field,
   * `transport` otherwise.
   */
  streamChat(history: readonly Turn[], opts: StreamChatOptions): Promise<AsyncIterable<StreamChunk>>;
}
