/**
 * Standardized response envelopes shared by every route.
 */

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(
  message: string,
  errors?: Array<{ path: string; message: string }>,
  code?: string
): ErrorResponse {
  const response: ErrorResponse = { success: false, message };
  if (errors && errors.length > 0) response.errors = errors;
  if (code) response.code = code;
  return response;
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}
