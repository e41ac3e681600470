import type {
  Code,
  OverlapConfig,
  RandomSource,
  SolutionChain,
} from "@breachgrid/core";

function randomCodes(
  pool: readonly Code[],
  count: number,
  rng: RandomSource,
): Code[] {
  const codes: Code[] = [];
  for (let i = 0; i < count; i++) {
    codes.push(pool[rng.nextInt(pool.length)]);
  }
  return codes;
}

const EMPTY_CHAIN: SolutionChain = { sequences: [], mergedPath: [] };

/**
 * Build the target sequences and their merged path.
 *
 * Junction `i` sits between sequence `i - 1` and sequence `i`. A junction
 * chosen to overlap starts its sequence with the last `overlapDepth` codes of
 * the previous one, and only the remainder is appended to the merged path.
 * The previous sequence is always the tail of the merged path, so every
 * sequence stays contiguous inside it.
 *
 * Returns an empty chain when the lengths are empty or not all positive.
 */
export function generateOverlappingSequences(
  config: OverlapConfig,
  rng: RandomSource,
): SolutionChain {
  const { codePool, sequenceLengths } = config;
  if (sequenceLengths.length === 0 || codePool.length === 0) {
    return EMPTY_CHAIN;
  }
  if (sequenceLengths.some((len) => !Number.isInteger(len) || len < 1)) {
    return EMPTY_CHAIN;
  }

  const first = randomCodes(codePool, sequenceLengths[0], rng);
  if (sequenceLengths.length === 1) {
    return { sequences: [first], mergedPath: [...first] };
  }

  const junctions = Array.from(
    { length: sequenceLengths.length - 1 },
    (_, i) => i + 1,
  );
  const overlapping = new Set(
    rng.sample(junctions, Math.min(config.overlapCount, junctions.length)),
  );

  const sequences: Code[][] = [first];
  const mergedPath: Code[] = [...first];

  for (let i = 1; i < sequenceLengths.length; i++) {
    const length = sequenceLengths[i];
    const prev = sequences[i - 1];
    const depth = overlapping.has(i)
      ? Math.min(config.overlapDepth, length - 1, prev.length)
      : 0;

    if (depth > 0) {
      const shared = prev.slice(prev.length - depth);
      const rest = randomCodes(codePool, length - depth, rng);
      sequences.push([...shared, ...rest]);
      mergedPath.push(...rest);
    } else {
      const seq = randomCodes(codePool, length, rng);
      sequences.push(seq);
      mergedPath.push(...seq);
    }
  }

  return { sequences, mergedPath };
}

/**
 * Split `maxTotal` codes across `count` sequences: every sequence starts at
 * `minLength` and random sequences below `maxLength` grow one code at a time.
 */
export function randomSequenceLengths(
  count: number,
  minLength: number,
  maxTotal: number,
  rng: RandomSource,
  maxLength = 5,
): number[] {
  const lengths = Array<number>(count).fill(minLength);
  let remaining = maxTotal - count * minLength;

  while (remaining > 0) {
    const growable: number[] = [];
    for (let i = 0; i < count; i++) {
      if (lengths[i] < maxLength) growable.push(i);
    }
    const idx = rng.pick(growable);
    if (idx === undefined) break;
    lengths[idx]++;
    remaining--;
  }

  return rng.shuffle(lengths);
}

/**
 * Lengths for `count` sequences whose merged path should be `mergedLength`
 * codes when every junction shares `overlapSize` codes. Each length is at
 * least 3; the total is capped at `count * maxLength`.
 */
export function randomLengths(
  mergedLength: number,
  count: number,
  overlapSize: number,
  rng: RandomSource,
  maxLength = 4,
): number[] {
  const minLength = 3;
  const total = Math.min(
    mergedLength + overlapSize * (count - 1),
    count * maxLength,
  );
  return randomSequenceLengths(count, minLength, total, rng, maxLength);
}
