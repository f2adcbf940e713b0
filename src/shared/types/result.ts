export type AppError = {
  status: number;
  code: string;
  message: string;
  details?: unknown;
};

/**
 * Narrow an unknown thrown value to the AppError shape
 */
export const isAppError = (error: unknown): error is AppError => {
  return (
    error instanceof Error
    && 'status' in error
    && typeof error.status === 'number'
    && 'code' in error
    && typeof error.code === 'string'
  );
};
