import { PcopyError } from "./errors.js";

/**
 * Read side of a cancellation, checked by engines at block/chunk boundaries.
 * Setting it is cheap and lock-free so a signal handler can do it.
 */
export type CancellationToken = Readonly<{
  isCancelled: () => boolean;
  reason: () => string | null;
  throwIfCancelled: () => void;
}>;

export type Cancellation = Readonly<{
  token: CancellationToken;
  cancel: (reason?: string) => void;
}>;

export function createCancellation(): Cancellation {
  let cancelledReason: string | null = null;

  const token: CancellationToken = Object.freeze({
    isCancelled: () => cancelledReason !== null,
    reason: () => cancelledReason,
    throwIfCancelled: () => {
      if (cancelledReason !== null) throw new PcopyError("PCOPY_CANCELLED", cancelledReason);
    },
  });

  return Object.freeze({
    token,
    cancel: (reason = "operation cancelled") => {
      if (cancelledReason === null) cancelledReason = reason;
    },
  });
}

export const NEVER_CANCELLED: CancellationToken = createCancellation().token;
