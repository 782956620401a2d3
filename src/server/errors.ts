/**
 * Course RAG Error Handling
 *
 * Only three conditions reach a caller as request errors: invalid input,
 * no materials found, and search hits that could not be matched to stored
 * documents. Optional backends (embedding model, graph store, generative
 * model) never surface here; they degrade inside the pipeline.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Request errors
  | 'VALIDATION_ERROR'
  | 'MATERIALS_NOT_FOUND'
  | 'DOCUMENTS_NOT_MATCHED'

  // Infrastructure errors
  | 'VECTOR_INDEX_ERROR'
  | 'RELATIONAL_STORE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Map component error class names to categories.
 * Component errors carrying a `code` keep it in details.errorCode.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  VectorError: 'VECTOR_INDEX_ERROR',
  RelationalStoreError: 'RELATIONAL_STORE_ERROR',
  EmbeddingError: 'INTERNAL_ERROR',
  BackendError: 'INTERNAL_ERROR',
  ZodError: 'CONFIGURATION_ERROR',
};

/**
 * Error codes that mean the process is misconfigured rather than the store broken
 */
const CONFIGURATION_CODES = new Set(['DIMENSION_MISMATCH', 'VEC_EXTENSION_NOT_LOADED', 'DATABASE_OPEN_FAILED']);

// ═══════════════════════════════════════════════════════════════════════════════
// RAG ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * RagError - structured error returned by the pipeline and every tool
 */
export class RagError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RagError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RagError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): RagError {
    if (error instanceof RagError) {
      return error;
    }

    if (error instanceof Error) {
      const code = readStringField(error, 'code');
      const category =
        code !== undefined && CONFIGURATION_CODES.has(code)
          ? 'CONFIGURATION_ERROR'
          : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      const customDetails = readRecordField(error, 'details');
      return new RagError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new RagError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

function readStringField(error: Error, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

function readRecordField(error: Error, field: string): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(error, field);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Suggested next step for the client after an error
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'course_ask',
    hint: 'Send a non-empty message and a limit between 1 and 8',
  },
  MATERIALS_NOT_FOUND: {
    tool: 'course_examples',
    hint: 'Rephrase the question or try one of the example prompts',
  },
  DOCUMENTS_NOT_MATCHED: {
    tool: 'course_health',
    hint: 'The vector index and the relational store are out of sync; re-run ingestion',
  },
  VECTOR_INDEX_ERROR: {
    tool: 'course_health',
    hint: 'Check VECTOR_DB_PATH and that the collection was provisioned',
  },
  RELATIONAL_STORE_ERROR: {
    tool: 'course_health',
    hint: 'Check RELATIONAL_DB_PATH and that assignments/documents tables exist',
  },
  CONFIGURATION_ERROR: {
    tool: 'course_health',
    hint: 'Check environment variables; EMBEDDING_DIM must match the collection dimension',
  },
  INTERNAL_ERROR: { tool: 'course_health', hint: 'Run course_health for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatErrorResponse(error: RagError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): RagError {
  return new RagError('VALIDATION_ERROR', message, details);
}

/**
 * Vector search returned no candidates
 */
export function materialsNotFoundError(question: string): RagError {
  return new RagError('MATERIALS_NOT_FOUND', 'No course materials found for this query.', {
    question,
  });
}

/**
 * Candidates existed but none resolved to a stored document
 */
export function documentsNotMatchedError(candidateCount: number): RagError {
  return new RagError(
    'DOCUMENTS_NOT_MATCHED',
    'Could not match the search results to stored documents.',
    { candidateCount }
  );
}

export function configurationError(message: string, details?: Record<string, unknown>): RagError {
  return new RagError('CONFIGURATION_ERROR', message, details);
}
