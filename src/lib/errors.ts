export type PromptErrorKind =
  | 'MissingConfiguration'
  | 'InvalidConfiguration'
  | 'UnsupportedModel'
  | 'RemoteCallFailure'
  | 'ResponseParseFailure';

export class PromptError extends Error {
  readonly kind: PromptErrorKind;

  constructor(kind: PromptErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PromptError';
    this.kind = kind;
  }
}

export function isPromptError(err: unknown): err is PromptError {
  return err instanceof PromptError;
}

// Every failure is terminal for a single-shot run.
const EXIT_CODES: Record<PromptErrorKind, number> = {
  MissingConfiguration: 1,
  InvalidConfiguration: 1,
  UnsupportedModel: 1,
  RemoteCallFailure: 1,
  ResponseParseFailure: 1,
};

export function exitCodeFor(kind: PromptErrorKind): number {
  return EXIT_CODES[kind];
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
