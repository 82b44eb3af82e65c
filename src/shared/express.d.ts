/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer; the sync controller reports totalTimeMs from it. */
      requestStartTime?: number;
    }
  }
}

export {};
