// ============================================
// ERROR TYPES
// ============================================

export enum PlankaErrorType {
  CONFIG_CORRUPT = 'CONFIG_CORRUPT',
  CONFIG_INVALID = 'CONFIG_INVALID',
  AUTH_ERROR = 'AUTH_ERROR',
  API_ERROR = 'API_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  IO_ERROR = 'IO_ERROR',
}

export interface PlankaErrorOptions {
  status?: number;
  details?: unknown;
  hint?: string;
  cause?: unknown;
}

export class PlankaError extends Error {
  public readonly type: PlankaErrorType;
  public readonly status?: number;
  public readonly details?: unknown;
  public readonly hint?: string;

  constructor(type: PlankaErrorType, message: string, options: PlankaErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PlankaError';
    this.type = type;
    this.status = options.status;
    this.details = options.details;
    this.hint = options.hint;
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      status: this.status,
      details: this.details,
      hint: this.hint,
    };
  }
}

export function isPlankaError(error: unknown): error is PlankaError {
  return error instanceof PlankaError;
}

// Node fs errors carry a string `code` (ENOENT, EACCES, ...)
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
