/** The model's decision text held no usable `{ should_reply, reply_content }` object. */
export class DecisionParseError extends Error {
  public readonly rawText: string;

  public constructor(message: string, rawText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecisionParseError';
    this.rawText = rawText;
  }
}

/** No text-chat provider is configured, so no decision can be made. */
export class UpstreamUnavailableError extends Error {
  public constructor(message = 'no text-chat provider is configured') {
    super(message);
    this.name = 'UpstreamUnavailableError';
  }
}

/** The conversation or persona source failed while building decision context. */
export class HistoryLookupError extends Error {
  public readonly origin: string;

  public constructor(origin: string, options?: { cause?: unknown }) {
    super(`history lookup failed for ${origin}`, options);
    this.name = 'HistoryLookupError';
    this.origin = origin;
  }
}

export const isAbortLikeError = (err: unknown): boolean => {
  if (!(err instanceof Error)) return false;
  return err.name === 'AbortError' || /aborted|aborterror/iu.test(err.message);
};
