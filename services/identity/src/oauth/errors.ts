export class OAuthResolutionError extends Error {
  readonly provider: string;

  constructor(provider: string, message: string, options: { cause?: unknown } = {}) {
    super(`${provider}: ${message}`);
    this.name = 'OAuthResolutionError';
    this.provider = provider;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
