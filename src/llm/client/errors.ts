/**
 * A failure the model provider classified itself (throttling, validation,
 * access denied, ...). `code` and `message` come from the provider verbatim.
 */
export class ProviderError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
  }
}
