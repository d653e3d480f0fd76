/**
 * Security module exports.
 *
 * Layers:
 * - Input validation (pattern library, filename/URL/API key checks)
 * - Data sanitization (sensitive-key and inline secret redaction)
 * - Rate limiting with progressive backoff
 * - Access control (domain allowlist, identifier blocklist)
 * - Threat detection and audit logging
 *
 * Applications use SecurityManager; the components are exported for
 * callers that compose their own pipeline.
 */

export * from "./access-control.js";
export * from "./audit.js";
export * from "./block-table.js";
export * from "./input-validator.js";
export * from "./manager.js";
export { containsInvisible, normalizeForScan } from "./normalize.js";
export * from "./patterns.js";
export * from "./rate-limit.js";
export * from "./sanitizer.js";
export * from "./threat-detector.js";
export * from "./types.js";
