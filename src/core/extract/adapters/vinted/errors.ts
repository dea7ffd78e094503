export type VintedApiErrorCode = 'ITEM_ID_MISSING' | 'SESSION_FAILED' | 'INVALID_PAYLOAD';

export class VintedApiError extends Error {
  constructor(
    message: string,
    public readonly code: VintedApiErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'VintedApiError';
    Object.setPrototypeOf(this, VintedApiError.prototype);
  }
}
