/**
 * HTTP Error Type
 * Typed error class for HttpClient implementations
 */
export class HttpError extends Error {
  isAxiosError?: boolean;
  /** Transport error code (ECONNREFUSED, ECONNABORTED, ERR_CANCELED, ...) */
  code?: string;
  status?: number;
  response?: {
    status: number;
    statusText: string;
    data: unknown;
    headers?: Record<string, string | string[]>;
  };

  constructor(message: string, properties?: Omit<HttpError, 'message' | 'name'>) {
    super(message);
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';

    if (properties?.isAxiosError) {
      this.isAxiosError = properties.isAxiosError;
    }
    if (properties?.code !== undefined) {
      this.code = properties.code;
    }
    if (properties?.status !== undefined) {
      this.status = properties.status;
    }
    if (properties?.response) {
      this.response = properties.response;
    }
  }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export function isTimeoutError(error: HttpError): boolean {
  return error.code !== undefined && TIMEOUT_CODES.has(error.code);
}

export function isCancelError(error: HttpError): boolean {
  return error.code === 'ERR_CANCELED';
}
