/**
 * Configuration constants
 */

export const TOOL_NAME = 'claimcite';
export const TOOL_VERSION = '1.0.0';
export const DEFAULT_CONFIG_FILENAME = '.claimcite.yaml';
export const ALLOWED_EXTS = new Set(['.md', '.txt', '.mdx']);

// Fallback label when no URL or query identifies where evidence came from
export const GENERIC_SOURCE_LABEL = 'Research Data';

export const REFERENCES_HEADING = '## References';
