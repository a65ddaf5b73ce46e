export class RequestError extends Error {
  readonly method: string;
  readonly url: string;

  constructor(message: string, method: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestError';
    this.method = method;
    this.url = url;
  }
}

export class HttpStatusError extends RequestError {
  readonly status: number;

  constructor(method: string, url: string, status: number) {
    super(`${method} ${url} failed with status ${status}`, method, url);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

/** A 2xx response whose JSON does not have the envelope the caller reads from. */
export class ResponseShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseShapeError';
  }
}
