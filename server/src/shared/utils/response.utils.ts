/**
 * Shared response envelope: every API answer is `{ success, data?, error? }`.
 */

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}

export class ResponseUtils {
  public static success<T>(data: T): ApiResponse<T> {
    return { success: true, data };
  }

  /** Failure envelope; `data` lets callers keep an empty payload shape. */
  public static error<T = never>(error: string | Error, data?: T): ApiResponse<T> {
    const out: ApiResponse<T> = {
      success: false,
      error: error instanceof Error ? error.message : error,
    };
    if (data !== undefined) out.data = data;
    return out;
  }

  public static notFound(resource: string): ApiResponse<never> {
    return { success: false, error: `${resource} not found` };
  }

  public static internalError(message = 'Internal server error'): ApiResponse<never> {
    return { success: false, error: message };
  }
}
