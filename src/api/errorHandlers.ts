import { Request, Response, NextFunction } from 'express';
import { RelayerException } from '../types/errors';
import { logger } from '../utils/logger';
import type { ErrorKind } from '../types/errors';

/**
 * HTTP status for an error returned by the relayer or the transfer module
 */
export function statusForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'ChainNotFound':
    case 'ChannelNotFound':
    case 'ConnectionNotFound':
    case 'ClientNotFound':
    case 'PacketNotFound':
      return 404;
    case 'NoAvailableProvider':
    case 'LightClientUnavailable':
      return 503;
    case 'ClientFrozen':
    case 'ClientUpdateStalled':
    case 'PacketMismatch':
      return 409;
    case 'SendDisabled':
    case 'ReceiveDisabled':
    case 'InvalidDenomTrace':
    case 'InvalidPacketData':
    case 'InsufficientFunds':
    case 'UnknownAcknowledgement':
    case 'Capability':
    case 'InvalidChannelParameters':
      return 400;
  }
}

/**
 * Generic error handler for API routes
 * Transforms errors into appropriate HTTP responses
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof RelayerException) {
    const status = statusForKind(error.error.kind);
    logger.warn(`[API Error] ${req.method} ${req.originalUrl}: ${error.message}`, { kind: error.error.kind, status });
    res.status(status).json({
      success: false,
      error: error.error.kind,
      message: error.message
    });
    return;
  }

  logger.logError(error, `[API Error] ${req.method} ${req.originalUrl}`);
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'production'
      ? 'An unexpected error occurred'
      : (error instanceof Error ? error.message : 'Unknown error')
  });
}
