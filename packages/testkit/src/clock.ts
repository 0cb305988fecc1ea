export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
}>;

/** Millisecond clock that only moves when told to. */
export function createManualClock(startMs = 0): ManualClock {
  let t = startMs;
  return Object.freeze({
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
    set: (ms: number) => {
      t = ms;
    },
  });
}
