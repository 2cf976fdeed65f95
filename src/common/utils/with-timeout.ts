import { DependencyError, describeError } from "../errors/ussd.errors";

/**
 * Runs a dependency call under a deadline. Timeouts and failures both surface
 * as DependencyError; DependencyErrors raised inside pass through untouched.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  dependency: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DependencyError(dependency, `timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([operation, deadline]);
  } catch (error) {
    if (error instanceof DependencyError) throw error;
    throw new DependencyError(dependency, describeError(error), { cause: error });
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
