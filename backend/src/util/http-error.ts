export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

/** Raised when a market-data or sentiment provider fails or answers non-2xx. */
export class UpstreamError extends HttpError {
  readonly upstreamStatus?: number;

  constructor(statusCode: number, message: string, upstreamStatus?: number) {
    super(statusCode, message);
    this.name = 'UpstreamError';
    this.upstreamStatus = upstreamStatus;
  }
}

export function upstreamStatusToHttp(status: number): number {
  return status >= 400 && status < 500 ? status : 502;
}
