/**
 * Failure of an outbound call (LLM, search, page fetch, process).
 *
 * Services raise it internally and convert it to a sentinel value at their
 * boundary, so a stage sees error text or an empty list instead of a throw.
 */
export class ExternalServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(`[${service}] ${message}`);
    this.name = "ExternalServiceError";
  }
}
