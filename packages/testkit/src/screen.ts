import xtermHeadless from "@xterm/headless";

export type ScreenSnapshot = Readonly<{
  cols: number;
  rows: number;
  lines: readonly string[];
}>;

export type Screen = Readonly<{
  write: (data: string) => Promise<void>;
  resize: (cols: number, rows: number) => Promise<void>;
  snapshot: () => ScreenSnapshot;
  cursorRow: () => number;
}>;

/** Headless terminal that interprets the escape sequences a surface emits. */
export function createScreen(opts: Readonly<{ cols: number; rows: number }>): Screen {
  const { Terminal } = xtermHeadless;
  let cols = opts.cols;
  let rows = opts.rows;

  const term = new Terminal({
    cols,
    rows,
    allowProposedApi: true,
    convertEol: true,
    scrollback: 0,
  });

  let pending = Promise.resolve();
  const write = async (data: string): Promise<void> => {
    pending = pending.then(
      () =>
        new Promise<void>((resolve) => {
          term.write(data, resolve);
        }),
    );
    await pending;
  };

  const resize = async (nextCols: number, nextRows: number): Promise<void> => {
    cols = nextCols;
    rows = nextRows;
    pending = pending.then(() => {
      term.resize(nextCols, nextRows);
    });
    await pending;
  };

  const snapshot = (): ScreenSnapshot => {
    const lines: string[] = [];
    const buffer = term.buffer.active;
    for (let r = 0; r < rows; r++) {
      const line = buffer.getLine(buffer.viewportY + r);
      lines.push(line?.translateToString(true) ?? "");
    }
    return { cols, rows, lines };
  };

  const cursorRow = (): number => term.buffer.active.cursorY;

  return { write, resize, snapshot, cursorRow };
}
