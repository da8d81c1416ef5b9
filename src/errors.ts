/**
 * Bad or missing order input. Raised before the exchange is contacted
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(list.join('; '));
    this.name = 'ValidationError';
    this.issues = list;
  }
}

/**
 * Failure reported by the futures API or by the transport to it.
 * status is 0 when no HTTP response was received
 */
export class ExchangeError extends Error {
  readonly status: number;
  readonly code?: number;

  constructor(message: string, status = 0, code?: number) {
    super(message);
    this.name = 'ExchangeError';
    this.status = status;
    this.code = code;
  }

  describe() {
    return this.status ? `API Error ${this.status}: ${this.message}` : `Connection error: ${this.message}`;
  }
}
