export {
  createAuthServer,
  startHTTPServer,
  serializePair,
  API_PREFIX,
  RegisterBodySchema,
  LoginBodySchema,
  RefreshBodySchema,
} from './server.js';
export {
  asyncHandler,
  requestTimeout,
  requireAuth,
  extractAccessToken,
  readCookie,
} from './middleware.js';
