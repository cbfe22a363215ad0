export class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export class ProviderUnavailableError extends Error {
  readonly symbol?: string;

  constructor(message: string, options?: { cause?: unknown; symbol?: string }) {
    super(message, { cause: options?.cause });
    this.name = "ProviderUnavailableError";
    this.symbol = options?.symbol;
  }
}
