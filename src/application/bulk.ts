export interface BulkOperationError {
  index: number;
  message: string;
}

export interface BulkResult<T> {
  items: T[];
  errors: BulkOperationError[];
}

/**
 * Run `operation` for every request in turn. A failing request is recorded
 * with its index and the batch carries on.
 */
export async function runBulk<R, T>(
  requests: readonly R[],
  operation: (request: R) => Promise<T>
): Promise<BulkResult<T>> {
  const result: BulkResult<T> = { items: [], errors: [] };

  for (const [index, request] of requests.entries()) {
    try {
      result.items.push(await operation(request));
    } catch (error) {
      result.errors.push({
        index,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}
