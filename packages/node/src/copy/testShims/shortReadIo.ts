/** BlockIo shim for worker tests: the source looks truncated to its first read. */

import { NODE_BLOCK_IO } from "../protocol.js";

export const io = Object.freeze({
  ...NODE_BLOCK_IO,
  readSync(fd: number, buffer: Uint8Array, offset: number, length: number, position: number): number {
    if (offset > 0) return 0;
    return NODE_BLOCK_IO.readSync(fd, buffer, offset, Math.min(length, 16), position);
  },
});
