import { type ZodError } from 'zod';

export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
};

/** Shape shared by the domain's error classes (`TokenError`, `PairingError`, ...). */
export interface KindedError {
  kind: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface AppErrorOptions {
  /** Machine-readable cause, sent next to `code`. */
  reason?: string;
  safeMeta?: Record<string, unknown>;
}

/** Error that is safe to send to a client: `reason` and `safeMeta` end up in the response body. */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly reason: string | undefined;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.reason = options.reason;
    this.safeMeta = options.safeMeta ?? {};
  }

  /** The domain error's `kind` becomes `reason`; its `meta` is passed through. */
  static fromKind(code: ErrorCode, err: KindedError): AppError {
    return new AppError(code, err.message, { reason: err.kind, safeMeta: err.meta });
  }

  static fromZod(message: string, error: ZodError): AppError {
    const issues: ValidationIssue[] = error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    return new AppError(ErrorCode.VALIDATION, message, { safeMeta: { issues } });
  }

  get isServerError(): boolean {
    return this.httpStatus >= 500;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...(this.reason === undefined ? {} : { reason: this.reason }),
      ...this.safeMeta,
    };
  }
}
