/**
 * One-word lock in a SharedArrayBuffer, shared by every block worker of a
 * single copy. Only the positional writes to the target are serialized.
 */

const UNLOCKED = 0;
const LOCKED = 1;
const LOCK_WORD = 0;

export type SharedMutex = Readonly<{
  buffer: SharedArrayBuffer;
  lock: () => void;
  unlock: () => void;
  withLock: <T>(fn: () => T) => T;
}>;

export function createSharedMutexBuffer(): SharedArrayBuffer {
  return new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
}

export function createSharedMutex(buffer: SharedArrayBuffer): SharedMutex {
  if (buffer.byteLength < Int32Array.BYTES_PER_ELEMENT) {
    throw new RangeError("SharedMutex: buffer must hold at least one Int32 word");
  }
  const word = new Int32Array(buffer, 0, 1);

  const lock = (): void => {
    while (Atomics.compareExchange(word, LOCK_WORD, UNLOCKED, LOCKED) !== UNLOCKED) {
      Atomics.wait(word, LOCK_WORD, LOCKED);
    }
  };

  const unlock = (): void => {
    if (Atomics.compareExchange(word, LOCK_WORD, LOCKED, UNLOCKED) !== LOCKED) {
      throw new Error("SharedMutex: unlock without lock");
    }
    Atomics.notify(word, LOCK_WORD, 1);
  };

  const withLock = <T>(fn: () => T): T => {
    lock();
    try {
      return fn();
    } finally {
      unlock();
    }
  };

  return Object.freeze({ buffer, lock, unlock, withLock });
}

export function isLocked(buffer: SharedArrayBuffer): boolean {
  return Atomics.load(new Int32Array(buffer, 0, 1), LOCK_WORD) === LOCKED;
}
