import { Response } from 'express';

export interface ErrorBody {
  error: string;
}

export const sendResponse = <T extends object>(
  res: Response,
  statusCode: number,
  body: T
): void => {
  res.status(statusCode).json(body);
};

export const sendError = (
  res: Response,
  statusCode: number,
  message: string
): void => {
  sendResponse<ErrorBody>(res, statusCode, { error: message });
};
