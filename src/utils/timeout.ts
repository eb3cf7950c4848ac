import { TimeoutError } from './errors';

/**
 * Ждёт promise не дольше timeoutMs. Сама операция не отменяется и может
 * завершиться позже: вызывающий код должен сам решить, что с ней делать.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(timeoutMs, what)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
