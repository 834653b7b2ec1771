/**
 * Augment Express Request with app-specific fields.
 * Uses global namespace to match express-serve-static-core's declaration merging.
 */
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export {};
