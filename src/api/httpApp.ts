// src/api/httpApp.ts
import express, { Express, Request, Response, NextFunction } from 'express';
import { logger } from '../utils/index.js';
import { AppError, ErrorCode } from '../utils/errors.js';
import { type ChatTurnService } from '../services/ChatTurnService.js';
import { type HistoryWindow } from '../types/index.js';
import { chatRoutes } from './chatRoutes.js';

export interface HttpErrorBody {
  error: { code: string; message: string; details?: unknown };
}

/**
 * Maps an error raised by a route to an HTTP status and JSON body.
 */
export function toHttpError(error: unknown): { status: number; body: HttpErrorBody } {
  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: { error: { code: error.errorCode, message: error.message, details: error.details } },
    };
  }
  // express.json() rejects unparseable bodies with a SyntaxError
  if (error instanceof SyntaxError) {
    return { status: 400, body: { error: { code: ErrorCode.BadRequest, message: 'Malformed JSON body.' } } };
  }
  return { status: 500, body: { error: { code: ErrorCode.InternalServerError, message: 'Internal server error.' } } };
}

export function createHttpApp(chat: ChatTurnService, historyWindow: HistoryWindow): Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));
  app.use('/api', chatRoutes(chat, historyWindow));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toHttpError(error);
    if (status >= 500) {
      logger.error({ err: error }, `[API] ${req.method} ${req.originalUrl} failed`);
    } else {
      logger.warn(`[API] ${req.method} ${req.originalUrl} -> ${status}: ${body.error.message}`);
    }
    res.status(status).json(body);
  });

  return app;
}
