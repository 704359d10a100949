export interface ApiErrorBody {
  code: string;
  message: string;
}

export type ResponseMeta = Record<string, string | number | boolean>;

export type ApiResponse<T> =
  | { success: true; data: T; error: null; meta?: ResponseMeta }
  | { success: false; data: null; error: ApiErrorBody };

export function successResponse<T>(data: T, meta?: ResponseMeta): ApiResponse<T> {
  if (meta === undefined) {
    return { success: true, data, error: null };
  }
  return { success: true, data, error: null, meta };
}

export function errorResponse(code: string, message: string): ApiResponse<never> {
  return { success: false, data: null, error: { code, message } };
}
