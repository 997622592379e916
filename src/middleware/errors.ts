import { NextFunction, Request, Response } from 'express';
import { HttpError, errorMessage } from '../utils/errors';

const isBodyParseError = (err: unknown) =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';

export const notFoundHandler = (_req: Request, res: Response) => {
  res.status(404).json({ message: 'Not found' });
};

export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof HttpError) {
    return res.status(err.status).json({ message: err.message });
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ message: 'Invalid JSON body' });
  }
  console.error(err);
  res.status(500).json({ message: errorMessage(err) || 'Internal server error' });
};
