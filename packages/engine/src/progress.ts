import type { Code } from "@breachgrid/core";

export type Sequences = readonly (readonly Code[])[];

/**
 * Advance every incomplete sequence whose next code is `code` (every one,
 * for a wildcard). Mutates `progress` and returns a bitmask of the slots
 * that moved, so the caller can undo with `retreatProgress`.
 */
export function advanceProgress(
  sequences: Sequences,
  progress: number[],
  code: Code,
  wildcard: boolean,
): number {
  let advanced = 0;
  for (let i = 0; i < sequences.length; i++) {
    const seq = sequences[i];
    if (progress[i] >= seq.length) continue;
    if (wildcard || seq[progress[i]] === code) {
      progress[i]++;
      advanced |= 1 << i;
    }
  }
  return advanced;
}

export function retreatProgress(progress: number[], advanced: number): void {
  for (let i = 0; advanced !== 0; i++, advanced >>>= 1) {
    if (advanced & 1) progress[i]--;
  }
}

export function isComplete(
  sequences: Sequences,
  progress: readonly number[],
): boolean {
  for (let i = 0; i < sequences.length; i++) {
    if (progress[i] < sequences[i].length) return false;
  }
  return true;
}

/** Largest number of codes any incomplete sequence still needs. */
export function maxRemaining(
  sequences: Sequences,
  progress: readonly number[],
): number {
  let max = 0;
  for (let i = 0; i < sequences.length; i++) {
    const remaining = sequences[i].length - progress[i];
    if (remaining > max) max = remaining;
  }
  return max;
}

export function neededCodes(
  sequences: Sequences,
  progress: readonly number[],
): Set<Code> {
  const codes = new Set<Code>();
  for (let i = 0; i < sequences.length; i++) {
    const seq = sequences[i];
    if (progress[i] < seq.length) codes.add(seq[progress[i]]);
  }
  return codes;
}

/** Replay a run of codes against all sequences at once. */
export function verifyPathCompletes(
  path: readonly Code[],
  sequences: Sequences,
): boolean {
  const progress = sequences.map(() => 0);
  for (const code of path) {
    advanceProgress(sequences, progress, code, false);
  }
  return isComplete(sequences, progress);
}

/** True when `sequence` occurs in `buffer` in order, gaps allowed. */
export function bufferContainsSequence(
  buffer: readonly Code[],
  sequence: readonly Code[],
): boolean {
  if (sequence.length === 0) return true;
  let seqIndex = 0;
  for (const code of buffer) {
    if (code === sequence[seqIndex]) {
      seqIndex++;
      if (seqIndex >= sequence.length) return true;
    }
  }
  return false;
}
