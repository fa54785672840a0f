export interface RetryOptions {
  retries: number;
  delayMs: number;
  factor?: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const withRetry = async <T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> => {
  const factor = options.factor ?? 1.8;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.retries) {
        throw error;
      }

      const delay = Math.floor(options.delayMs * Math.pow(factor, attempt));
      options.onRetry?.(error, attempt + 1, delay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
};
