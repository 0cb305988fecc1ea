/**
 * BlockIo shim for worker tests: every read past the first block fails
 * with EIO, so a parallel copy always has at least one failing block.
 */

import { NODE_BLOCK_IO } from "../protocol.js";

function eio(): Error {
  return Object.assign(new Error("EIO: i/o error, read"), {
    code: "EIO",
    errno: -5,
    syscall: "read",
  });
}

export const io = Object.freeze({
  ...NODE_BLOCK_IO,
  readSync(fd: number, buffer: Uint8Array, offset: number, length: number, position: number): number {
    if (position > 0) throw eio();
    return NODE_BLOCK_IO.readSync(fd, buffer, offset, length, position);
  },
});
