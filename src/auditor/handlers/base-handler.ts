import type { Logger } from 'pino';
import type { AuditResponse } from '../actions.js';
import { createChildLogger } from '../../utils/logger.js';
import { AuditError, errorMessage } from '../../utils/errors.js';

export abstract class BaseHandler {
  protected readonly logger: Logger;

  constructor(name: string) {
    this.logger = createChildLogger(`handler:${name}`);
  }

  protected successResponse(action: string, data: unknown): AuditResponse {
    return {
      success: true,
      action,
      data,
      timestamp: new Date().toISOString(),
    };
  }

  protected errorResponse(action: string, error: string, details?: Record<string, unknown>): AuditResponse {
    this.logger.error({ action, error, ...details }, 'Handler error');
    return {
      success: false,
      action,
      error,
      ...(details ? { details } : {}),
      timestamp: new Date().toISOString(),
    };
  }

  protected failureResponse(action: string, err: unknown): AuditResponse {
    if (err instanceof AuditError) {
      return this.errorResponse(action, err.message, { code: err.code, ...err.context });
    }
    return this.errorResponse(action, errorMessage(err));
  }
}
