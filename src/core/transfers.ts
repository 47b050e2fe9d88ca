import { CurveError, type CurveErrorCode } from '../application/errors';

/**
 * Await a collaborator call that reports success as a boolean.
 * A `false` answer or a throw both become a CurveError with `code`.
 */
export async function requireTransfer(
  code: CurveErrorCode,
  message: string,
  call: () => Promise<boolean>,
  detail?: Record<string, unknown>,
): Promise<void> {
  let accepted: boolean;
  try {
    accepted = await call();
  } catch (e) {
    throw new CurveError(code, message, { cause: e, detail });
  }
  if (!accepted) throw new CurveError(code, message, { detail });
}
