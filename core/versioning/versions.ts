export const PROFILE_SCHEMA_VERSION = "1.0"
export const PROMPT_EXTRACT_VERSION = "extract-profile-v1"
export const ENGINE_VERSION = "match-engine-v1"
