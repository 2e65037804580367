/**
 * Default Anthropic models for the journey surfaces. The Sentinel runs on the
 * lighter model to keep the extra call per turn cheap; both can be overridden
 * through JOURNEY_RESPONSE_MODEL / JOURNEY_SENTINEL_MODEL.
 */
export const DEFAULT_RESPONSE_MODEL = 'claude-sonnet-4-5'

export const DEFAULT_SENTINEL_MODEL = 'claude-haiku-4-5'

export const RESPONSE_MAX_TOKENS = 1024

export const SENTINEL_MAX_TOKENS = 300
