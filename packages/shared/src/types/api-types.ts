/** Standard API success response wrapper */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/** Standard API error response */
export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/** Caller-supplied overrides for sheet and header detection (1-based rows) */
export interface AuditHints {
  sheetName?: string;
  headerStartRow?: number;
  headerEndRow?: number;
}
