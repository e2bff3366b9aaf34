import { HttpException } from '@nestjs/common';

/** Awaits a promise that must reject with an HttpException and returns it. */
export async function rejectionOf(promise: Promise<unknown>): Promise<HttpException> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

/** Same as rejectionOf for code that throws synchronously. */
export function thrownBy(action: () => unknown): HttpException {
  try {
    action();
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to throw');
}
