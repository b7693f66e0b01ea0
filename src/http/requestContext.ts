// src/http/requestContext.ts

/**
 * Request-scoped fields set by middleware (see correlationId.ts).
 * Modules that read them import this file for the type augmentation.
 */

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
