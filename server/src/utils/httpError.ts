/** Expected request failure; the error middleware answers with `status`. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }

  static badRequest(message: string) { return new HttpError(400, message); }
  static notFound(resource: string) { return new HttpError(404, `${resource} not found`); }
}
