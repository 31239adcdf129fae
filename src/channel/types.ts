/** Request/response link to the analysis tool. */
export interface CommandChannel {
  /** Resolves with the tool's raw output; rejects when the tool is unreachable. */
  send(command: string): Promise<string>;
  close(): Promise<void>;
}
