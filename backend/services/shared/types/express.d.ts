// backend/services/shared/types/express.d.ts

/**
 * Global Express request augmentation used by all services.
 * - requestId: set by the shared requestId middleware
 */
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export {};
