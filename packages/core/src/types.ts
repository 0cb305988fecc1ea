/** Top-level operation a progress line and a speed sample belong to. */
export type OperationKind = "copy" | "remove";

export type OverwriteDecision = "proceed" | "skip" | "proceedAll" | "abort";

/**
 * Asked before anything is written over an existing destination.
 * `proceedAll` lets the implementation stop asking for the rest of the job.
 */
export type OverwriteDecider = (target: string) => Promise<OverwriteDecision>;

export const alwaysOverwrite: OverwriteDecider = async () => "proceed";
