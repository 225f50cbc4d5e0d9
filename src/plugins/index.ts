// ============================================
// VOTESHIELD - Plugins Barrel Export
// ============================================

export { corsPlugin } from './cors.plugin.js';
export { websocketPlugin } from './websocket.plugin.js';
export {
  errorHandlerPlugin,
  AppError,
  NotFoundError,
  ValidationError,
  UnauthorizedError,
  ForbiddenError,
  ServiceUnavailableError,
  PollNotFoundError,
  InvalidPollError,
  InvalidVoteError,
  PollClosedError,
  DuplicateVoteError,
  FraudDetectedError,
  FingerprintValidationError,
  RateLimitError,
} from './error-handler.plugin.js';
export { authPlugin, signToken, verifyToken, type JwtPayload } from './auth.plugin.js';
export { fingerprintPlugin, FINGERPRINT_HEADER } from './fingerprint.plugin.js';
export { servicesPlugin, type ServicesPluginOptions } from './services.plugin.js';
export { patternAnalysisPlugin, type PatternAnalysisPluginOptions } from './pattern-analysis.plugin.js';
export { voteRateLimitPlugin, type VoteRateLimitOptions } from './rate-limit.plugin.js';
