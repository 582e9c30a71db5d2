/**
 * Request augmentation for guarded routes
 */

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by requireAuth once the access token has been accepted */
      identity?: string;
    }
  }
}

export {};
