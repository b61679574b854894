/**
 * HTTP error class for consistent status propagation in page routes.
 */
export class HttpError extends Error {
  status: number;
  expose: boolean;
  constructor(status: number, message: string, options?: { expose?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "HttpError";
    this.status = status;
    this.expose = Boolean(options?.expose);
  }
}

export function isHttpError(e: unknown): e is HttpError {
  return e instanceof HttpError;
}

export function notFound(message = "Страница не найдена"): HttpError {
  return new HttpError(404, message, { expose: true });
}

export function forbidden(message = "Доступ запрещён"): HttpError {
  return new HttpError(403, message, { expose: true });
}
