export type ProviderName = 'google' | 'serpapi' | 'crawler' | 'anthropic';

export type ProviderErrorCode = 'not_configured' | 'http' | 'upstream' | 'not_found';

export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly code: ProviderErrorCode;
  readonly status?: number;

  constructor(provider: ProviderName, code: ProviderErrorCode, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.code = code;
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof ProviderError) {
    return error.status ? `${error.message} (HTTP ${error.status})` : error.message;
  }
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}
