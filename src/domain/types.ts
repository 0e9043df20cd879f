/**
 * Common types for the Stedsnavn OSM server
 */

/**
 * Scope-level error codes. Any of these aborts the affected output unit only.
 */
export type ErrorCode =
  | 'INVALID_INPUT'
  | 'LOOKUP_FAILED'
  | 'SOURCE_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'INTERNAL_ERROR';

/**
 * Structured error object, thrown by sources and returned in tool responses
 */
export interface ConversionError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: {
    upstreamStatus?: number;
    requestId?: string;
    retryAfterSeconds?: number;
    [key: string]: unknown;
  };
}

/**
 * Non-fatal issue kinds collected during a run
 */
export type IssueKind =
  | 'MALFORMED_RECORD'
  | 'UNKNOWN_NAME_TYPE'
  | 'AMBIGUOUS_NAME'
  | 'DUPLICATE_NAME'
  | 'GEOMETRY_FAILURE';

export interface ConversionIssue {
  kind: IssueKind;
  placeId?: string;
  municipalityCode?: string;
  message: string;
}

export interface Attribution {
  licenseUri: string;
  creditLine: string;
}

/**
 * Source metadata included in tool responses
 */
export interface SourceMetadata {
  provider: string;
  product: string;
  licenseUri: string;
  creditLine: string;
  mode: 'static' | 'wfs';
}
