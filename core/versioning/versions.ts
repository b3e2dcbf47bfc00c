export const ENGINE_VERSION = "match-engine-1.2.0"
export const JOB_ANALYSIS_SCHEMA_VERSION = "1.0"
export const PROMPT_ANALYZE_JOB_VERSION = "analyze-job-v3"
export const PROMPT_RECOMMENDATIONS_VERSION = "recommendations-v2"
