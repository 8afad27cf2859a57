/**
 * Error taxonomy
 *
 * Only RegistryLoadError, ConfigurationError, RequestValidationError and
 * AnalysisAbortedError ever reach a caller of the engine. The others are
 * recorded in phase reports and degrade the response.
 */

export type ErrorCode =
  | 'REGISTRY_LOAD_ERROR'
  | 'PATTERN_COMPILE_ERROR'
  | 'ENRICHMENT_ERROR'
  | 'RULE_EVALUATION_ERROR'
  | 'BRIDGE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'ANALYSIS_ABORTED'
  | 'INTERNAL_ERROR';

export interface SerializedError {
  error: ErrorCode;
  message: string;
  details: Record<string, unknown>;
}

export class MarkerEngineError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON(): SerializedError {
    return { error: this.code, message: this.message, details: this.details };
  }
}

// =============================================================================
// Registry
// =============================================================================

export type RegistryIssueCode =
  | 'invalid_document'
  | 'invalid_definition'
  | 'duplicate_id'
  | 'id_mismatch'
  | 'invalid_pattern'
  | 'unresolved_reference'
  | 'invalid_threshold'
  | 'max_depth_exceeded'
  | 'cycle';

export interface RegistryIssue {
  code: RegistryIssueCode;
  message: string;
  markerId?: string;
}

export class PatternCompileError extends MarkerEngineError {
  constructor(
    readonly markerId: string,
    readonly pattern: string,
    cause: unknown
  ) {
    super(
      `Marker ${markerId}: invalid pattern /${pattern}/: ${errorMessage(cause)}`,
      'PATTERN_COMPILE_ERROR',
      { markerId, pattern },
      { cause }
    );
  }
}

export class RegistryLoadError extends MarkerEngineError {
  constructor(
    readonly schemaId: string,
    readonly issues: RegistryIssue[]
  ) {
    super(
      `Registry ${schemaId} failed to load: ${issues.map((i) => i.message).join('; ')}`,
      'REGISTRY_LOAD_ERROR',
      { schemaId, issues }
    );
  }
}

// =============================================================================
// Analysis
// =============================================================================

export class EnrichmentError extends MarkerEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ENRICHMENT_ERROR', {}, options);
  }
}

export class RuleEvaluationError extends MarkerEngineError {
  constructor(readonly markerId: string, cause: unknown) {
    super(
      `${markerId}: ${errorMessage(cause)}`,
      'RULE_EVALUATION_ERROR',
      { markerId },
      { cause }
    );
  }
}

export class BridgeError extends MarkerEngineError {
  constructor(readonly provider: string, message: string, options?: { cause?: unknown }) {
    super(message, 'BRIDGE_ERROR', { provider }, options);
  }
}

export class ConfigurationError extends MarkerEngineError {
  constructor(message: string, configKey?: string) {
    super(message, 'CONFIGURATION_ERROR', configKey ? { configKey } : {});
  }
}

export class RequestValidationError extends MarkerEngineError {
  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', field ? { field } : {});
  }
}

export class AnalysisAbortedError extends MarkerEngineError {
  constructor(readonly phase: string) {
    super(`Analysis aborted before ${phase}`, 'ANALYSIS_ABORTED', { phase });
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toMarkerEngineError(error: unknown): MarkerEngineError {
  if (error instanceof MarkerEngineError) return error;
  return new MarkerEngineError(errorMessage(error), 'INTERNAL_ERROR', {}, { cause: error });
}
