// src/utils/errorResponse.ts — JSON envelopes for API replies

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  /** One entry per rejected field; omitted when empty. */
  errors?: FieldError[];
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function errorBody(message: string, code?: string, errors: FieldError[] = []): ErrorResponse {
  const body: ErrorResponse = { success: false, message };
  if (errors.length > 0) body.errors = errors;
  if (code) body.code = code;
  return body;
}

export const successBody = <T>(data: T): SuccessResponse<T> => ({ success: true, data });
