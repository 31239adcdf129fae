export type AgentErrorKind =
  | 'transport'
  | 'timeout'
  | 'unsupported_parameter'
  | 'exhausted'
  | 'config'
  | 'channel';

type AgentErrorOpts = {
  retryable?: boolean;
  cause?: unknown;
};

export class AgentError extends Error {
  readonly kind: AgentErrorKind;
  readonly retryable: boolean;

  constructor(kind: AgentErrorKind, message: string, opts: AgentErrorOpts = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AgentError';
    this.kind = kind;
    this.retryable = opts.retryable ?? false;
  }
}

export function isAgentError(e: unknown, kind?: AgentErrorKind): e is AgentError {
  return e instanceof AgentError && (kind === undefined || e.kind === kind);
}

export function isUnsupportedParameterError(e: unknown): boolean {
  return isAgentError(e, 'unsupported_parameter');
}

/**
 * Normalize any thrown value into a message and, where one exists, a stack.
 * Values thrown inside a vm context are not `instanceof Error` here, so the
 * fields are read structurally.
 */
export function describeError(e: unknown): { message: string; stack?: string } {
  if (e === null || e === undefined) return { message: 'Unknown error' };
  if (typeof e === 'string') return { message: e };
  if (typeof e === 'object') {
    const message = 'message' in e && typeof e.message === 'string' ? e.message : String(e);
    const stack = 'stack' in e && typeof e.stack === 'string' ? e.stack : undefined;
    return { message, stack };
  }
  return { message: String(e) };
}

export function errorMessage(e: unknown): string {
  return describeError(e).message;
}
