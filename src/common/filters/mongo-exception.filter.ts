import { ArgumentsHost, Catch, HttpStatus, Logger } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { Response } from 'express';

function readField(err: unknown, key: 'code' | 'cause' | 'name' | 'message'): unknown {
  return typeof err === 'object' && err !== null && key in err ? Reflect.get(err, key) : undefined;
}

/** Returns true if the error or any cause is a MongoDB duplicate key error (code 11000). */
export function isMongoDuplicateKey(err: unknown): boolean {
  let e: unknown = err;
  while (e) {
    const code = readField(e, 'code');
    if (code === 11000 || code === 11001) return true;
    e = readField(e, 'cause');
  }
  return false;
}

const CONNECTION_ERROR_NAMES = new Set([
  'MongoNetworkError',
  'MongoServerSelectionError',
  'MongoNetworkTimeoutError',
  'MongooseServerSelectionError',
]);

/** Returns true if the error looks like a MongoDB connection / database unavailable error. */
export function isMongoConnectionError(err: unknown): boolean {
  const name = String(readField(err, 'name') ?? '');
  const msg = String(readField(err, 'message') ?? '').toLowerCase();
  return (
    CONNECTION_ERROR_NAMES.has(name) ||
    msg.includes('connect econnrefused') ||
    msg.includes('topology was destroyed') ||
    msg.includes('server selection timed out')
  );
}

/**
 * Global filter: MongoDB duplicate key (11000) becomes 409, connection errors become 503.
 * Everything else goes to Nest's default handling.
 */
@Catch()
export class MongoExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(MongoExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (isMongoDuplicateKey(exception)) {
      this.logger.warn(`MongoDB duplicate key: ${String(readField(exception, 'message') ?? '')}`);
      response.status(HttpStatus.CONFLICT).json({
        statusCode: HttpStatus.CONFLICT,
        message: 'A record with this value already exists.',
        error: 'Conflict',
      });
      return;
    }

    if (isMongoConnectionError(exception)) {
      this.logger.error(`MongoDB connection error: ${String(readField(exception, 'message') ?? '')}`);
      response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: 'Database unavailable. Is MongoDB running? Check MONGODB_URI in .env.',
        error: 'Service Unavailable',
      });
      return;
    }

    super.catch(exception, host);
  }
}
