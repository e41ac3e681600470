import { strict as assert } from "assert";
import { SeededRng } from "@breachgrid/core";
import type { OverlapConfig } from "@breachgrid/core";
import {
  generateOverlappingSequences,
  randomLengths,
  randomSequenceLengths,
} from "./sequences";
import { bufferContainsSequence, verifyPathCompletes } from "./progress";

const POOL = ["1C", "BD", "55", "E9", "7A"];

function config(
  overlapCount: number,
  overlapDepth: number,
  sequenceLengths: number[],
  codePool: string[] = POOL,
): OverlapConfig {
  return { overlapCount, overlapDepth, codePool, sequenceLengths };
}

describe("generateOverlappingSequences", () => {
  it("builds a single sequence as its own merged path", () => {
    const chain = generateOverlappingSequences(
      config(0, 0, [3]),
      new SeededRng("single"),
    );
    assert.equal(chain.sequences.length, 1);
    assert.equal(chain.sequences[0].length, 3);
    assert.deepEqual(chain.mergedPath, chain.sequences[0]);
  });

  it("shares one code at an overlapping junction", () => {
    const chain = generateOverlappingSequences(
      config(1, 1, [3, 3]),
      new SeededRng("two-overlap"),
    );
    assert.equal(chain.mergedPath.length, 5);
    assert.equal(chain.sequences[1][0], chain.sequences[0][2]);
  });

  it("concatenates sequences without overlap", () => {
    const chain = generateOverlappingSequences(
      config(0, 1, [3, 3]),
      new SeededRng("no-overlap"),
    );
    assert.equal(chain.mergedPath.length, 6);
    assert.deepEqual(chain.mergedPath, [
      ...chain.sequences[0],
      ...chain.sequences[1],
    ]);
  });

  it("overlaps every junction when asked for more than exist", () => {
    const chain = generateOverlappingSequences(
      config(5, 2, [3, 3, 3]),
      new SeededRng("three-overlap"),
    );
    // 3 + (3 - 2) + (3 - 2)
    assert.equal(chain.mergedPath.length, 5);
    const [first, second, third] = chain.sequences;
    assert.deepEqual(second.slice(0, 2), first.slice(1));
    assert.deepEqual(third.slice(0, 2), second.slice(1));
  });

  it("clamps depth so a sequence keeps at least one code of its own", () => {
    const chain = generateOverlappingSequences(
      config(1, 5, [3, 2]),
      new SeededRng("clamp"),
    );
    assert.equal(chain.mergedPath.length, 4);
    assert.equal(chain.sequences[1][0], chain.sequences[0][2]);
  });

  it("keeps every sequence inside the merged path", () => {
    for (let i = 0; i < 20; i++) {
      const chain = generateOverlappingSequences(
        config(2, 1, [3, 4, 3]),
        new SeededRng(`contained-${i}`),
      );
      for (const seq of chain.sequences) {
        assert.ok(bufferContainsSequence(chain.mergedPath, seq));
      }
      assert.ok(verifyPathCompletes(chain.mergedPath, chain.sequences));
    }
  });

  it("draws codes from the pool only", () => {
    const chain = generateOverlappingSequences(
      config(1, 1, [4, 4], ["55", "7A"]),
      new SeededRng("pool"),
    );
    for (const code of chain.mergedPath) {
      assert.ok(code === "55" || code === "7A");
    }
  });

  it("returns an empty chain for empty lengths", () => {
    const chain = generateOverlappingSequences(
      config(0, 0, []),
      new SeededRng("empty"),
    );
    assert.deepEqual(chain, { sequences: [], mergedPath: [] });
  });

  it("returns an empty chain for a non-positive length", () => {
    const chain = generateOverlappingSequences(
      config(0, 0, [3, 0]),
      new SeededRng("zero"),
    );
    assert.deepEqual(chain, { sequences: [], mergedPath: [] });
  });

  it("is deterministic for a seed", () => {
    const same = config(1, 1, [3, 4]);
    const a = generateOverlappingSequences(same, new SeededRng("same"));
    const b = generateOverlappingSequences(same, new SeededRng("same"));
    assert.deepEqual(a, b);
  });
});

describe("randomSequenceLengths", () => {
  it("spends the whole budget when it fits", () => {
    for (let i = 0; i < 20; i++) {
      const rng = new SeededRng(`budget-${i}`);
      const lengths = randomSequenceLengths(2, 2, 9, rng);
      assert.equal(lengths.length, 2);
      assert.equal(lengths[0] + lengths[1], 9);
      for (const len of lengths) {
        assert.ok(len >= 2 && len <= 5);
      }
    }
  });

  it("stops growing at the maximum length", () => {
    const lengths = randomSequenceLengths(1, 2, 8, new SeededRng("cap"));
    assert.deepEqual(lengths, [5]);
  });

  it("never goes below the minimum", () => {
    const lengths = randomSequenceLengths(3, 3, 5, new SeededRng("floor"));
    assert.deepEqual(lengths, [3, 3, 3]);
  });
});

describe("randomLengths", () => {
  it("keeps every length within 3..4", () => {
    for (let i = 0; i < 20; i++) {
      const lengths = randomLengths(6, 3, 2, new SeededRng(`rl-${i}`));
      assert.equal(lengths.length, 3);
      for (const len of lengths) {
        assert.ok(len >= 3 && len <= 4, `length ${len} out of range`);
      }
    }
  });

  it("adds the overlap back onto the merged length", () => {
    const lengths = randomLengths(5, 2, 1, new SeededRng("rl-total"));
    assert.equal(lengths[0] + lengths[1], 6);
  });

  it("caps the total at count * maxLength", () => {
    const lengths = randomLengths(20, 2, 2, new SeededRng("rl-cap"));
    assert.deepEqual(lengths, [4, 4]);
  });
});
