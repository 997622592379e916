export class HttpError extends Error {
  status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class DatasetIntegrityError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Demo dataset failed integrity checks:\n - ${issues.join('\n - ')}`);
    this.name = 'DatasetIntegrityError';
    this.issues = issues;
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
