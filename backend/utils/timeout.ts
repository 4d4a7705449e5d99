/**
 * Wall-clock timeout with cooperative cancellation
 */
import { TimeoutError, getErrorMessage } from './errors';
import logger from './logger';

export interface TimeoutOptions {
  /**
   * On timeout, hold the rejection until the operation itself has settled.
   * Callers that clean up after a failure need the operation's writes to be over.
   */
  awaitSettled?: boolean;
}

/**
 * Run an operation that receives an AbortSignal, rejecting with TimeoutError
 * once `ms` elapses. The signal is aborted at the same moment so the
 * operation can stop between steps.
 */
export async function withTimeout<T>(
  ms: number,
  operation: string,
  run: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions = {}
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const task = run(controller.signal);
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation));
    }, ms);
  });

  try {
    return await Promise.race([task, timeout]);
  } catch (error) {
    if (options.awaitSettled && controller.signal.aborted) {
      await task.then(
        () => logger.debug('Operation finished after its timeout', { operation }),
        (lateError: unknown) => logger.debug('Operation stopped after its timeout', { operation, error: getErrorMessage(lateError) })
      );
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
