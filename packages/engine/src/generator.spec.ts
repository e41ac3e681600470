import { strict as assert } from "assert";
import {
  DIFFICULTIES,
  DIFFICULTY_TIERS,
  RandomSource,
  SeededRng,
  createTargetSequence,
  gridCodes,
  gridFromCodes,
  silentLogger,
} from "@breachgrid/core";
import type { Code, Position, Puzzle } from "@breachgrid/core";
import { generate, generateWithReport, verifySolverQuality } from "./generator";
import { generateFallback } from "./fallback";
import { sampleDifficultyParams } from "./params";
import type { DifficultyParams } from "./params";
import { solve } from "./solver";
import { validatePuzzle } from "./validate";

const logger = silentLogger();

/** Always takes the first option. */
class FirstChoice extends RandomSource {
  nextFloat(): number {
    return 0;
  }
}

function codesOf(puzzle: Puzzle): string[][] {
  return puzzle.sequences.map((s) => [...s.codes]);
}

/** Par is the true minimum: nothing shorter solves the board. */
function assertParIsMinimal(puzzle: Puzzle): void {
  const sequences = codesOf(puzzle);
  assert.ok(
    solve(puzzle.grid, sequences, puzzle.par, 1).solvable,
    "par does not solve",
  );
  if (puzzle.par > 1) {
    assert.equal(
      solve(puzzle.grid, sequences, puzzle.par - 1, 1).solvable,
      false,
      "par is not minimal",
    );
  }
}

describe("generate", () => {
  for (const difficulty of DIFFICULTIES) {
    describe(difficulty, () => {
      const tier = DIFFICULTY_TIERS[difficulty];
      const seeds =
        difficulty === "expert" ? ["g-1", "g-2"] : ["g-1", "g-2", "g-3"];

      for (const seed of seeds) {
        it(`produces a valid puzzle (seed ${seed})`, () => {
          const puzzle = generate(
            difficulty,
            new SeededRng(`${difficulty}-${seed}`),
            { logger },
          );

          assert.equal(puzzle.difficulty, difficulty);
          assert.equal(puzzle.grid.length, tier.gridSize);
          assert.ok(validatePuzzle(puzzle));
          assert.ok(puzzle.bufferSize >= puzzle.par);
          assert.ok(puzzle.bufferSize <= tier.bufferCap);
          assert.equal(puzzle.solutionPath[0].row, 0);
          assert.ok(puzzle.sequences.length >= 1);
          assertParIsMinimal(puzzle);
        });
      }
    });
  }

  it("is deterministic for a seed", () => {
    const a = generate("medium", new SeededRng("repeat"), { logger });
    const b = generate("medium", new SeededRng("repeat"), { logger });
    assert.deepEqual(a, b);
  });

  it("gives different boards for different seeds", () => {
    const a = generate("easy", new SeededRng("seed-a"), { logger });
    const b = generate("easy", new SeededRng("seed-b"), { logger });
    assert.notDeepEqual(a.grid, b.grid);
  });

  it("keeps gated puzzles inside the solution and false-start targets", () => {
    const tier = DIFFICULTY_TIERS.expert;
    for (const seed of ["gate-1", "gate-2"]) {
      const report = generateWithReport("expert", new SeededRng(seed), {
        logger,
      });
      if (report.usedFallback) continue;

      const { puzzle } = report;
      const result = solve(
        puzzle.grid,
        codesOf(puzzle),
        puzzle.bufferSize,
        tier.targetSolutions[1] + 1,
      );
      assert.ok(result.solutionCount >= tier.targetSolutions[0]);
      assert.ok(result.solutionCount <= tier.targetSolutions[1]);
      assert.ok(result.falseStarts >= tier.minFalseStarts);
    }
  });
});

describe("verifySolverQuality", () => {
  const gateParams: DifficultyParams = {
    gridSize: 3,
    sequenceCount: 1,
    sequenceLengths: [2],
    codePoolSize: 3,
    bufferMargin: 0,
    bufferCap: 8,
    overlapCount: 0,
    overlapDepth: 0,
    fill: { kind: "deceptive", density: 0 },
    usesQualityGate: true,
    targetSolutions: [1, 2],
    minFalseStarts: 1,
  };

  function gatedPuzzle(
    codes: Code[][],
    bufferSize: number,
    solutionPath: Position[],
  ): Puzzle {
    return {
      grid: gridFromCodes(codes),
      sequences: [createTargetSequence(["1C", "BD"])],
      bufferSize,
      par: solutionPath.length,
      difficulty: "expert",
      solutionPath,
    };
  }

  const chain = { sequences: [["1C", "BD"]], mergedPath: ["1C", "BD"] };

  it("keeps the advertised path's codes through adjustment", () => {
    const advertised = [
      { row: 0, col: 0 },
      { row: 1, col: 0 },
    ];
    const puzzle = gatedPuzzle(
      [
        ["1C", "FF", "1C"],
        ["BD", "FF", "FF"],
        ["BD", "1C", "BD"],
      ],
      2,
      advertised,
    );
    // The placed path ran down the right-hand column.
    const placedPath = [
      { row: 0, col: 2 },
      { row: 2, col: 2 },
    ];

    const outcome = verifySolverQuality(
      puzzle,
      chain,
      placedPath,
      ["1C", "BD", "FF"],
      gateParams,
      new FirstChoice(),
    );

    assert.ok(outcome.puzzle);
    assert.deepEqual(gridCodes(outcome.puzzle.grid), [
      ["1C", "FF", "1C"],
      ["BD", "FF", "FF"],
      ["FF", "FF", "BD"],
    ]);
    assert.deepEqual(outcome.puzzle.solutionPath, advertised);
    assert.equal(outcome.puzzle.par, 2);
    for (const pos of outcome.puzzle.solutionPath) {
      assert.equal(
        outcome.puzzle.grid[pos.row][pos.col].code,
        puzzle.grid[pos.row][pos.col].code,
      );
    }
  });

  it("rejects an adjustment that opens a path shorter than par", () => {
    const path = [
      { row: 0, col: 1 },
      { row: 1, col: 1 },
      { row: 1, col: 2 },
    ];
    const puzzle = gatedPuzzle(
      [
        ["FF", "1C", "FF"],
        ["FF", "FF", "BD"],
        ["FF", "FF", "FF"],
      ],
      3,
      path,
    );

    // Promotion writes 1C to (0,2), which pairs with the BD below it.
    const outcome = verifySolverQuality(
      puzzle,
      chain,
      path,
      ["1C", "BD", "FF"],
      { ...gateParams, targetSolutions: [2, 3], minFalseStarts: 0 },
      new FirstChoice(),
    );

    assert.equal(outcome.puzzle, undefined);
    assert.deepEqual(outcome.reason, { kind: "adjustment" });
  });
});

describe("generateWithReport", () => {
  it("falls back when no attempts are allowed", () => {
    const report = generateWithReport("hard", new SeededRng("no-budget"), {
      logger,
      maxAttempts: 0,
    });
    assert.equal(report.usedFallback, true);
    assert.equal(report.attempts, 0);
    assert.deepEqual(report.rejects, {});
    assert.equal(report.puzzle.par, 3);
    assert.equal(
      report.puzzle.bufferSize,
      DIFFICULTY_TIERS.hard.nominalBufferSize,
    );
    assert.ok(validatePuzzle(report.puzzle));
  });

  it("counts attempts and rejects", () => {
    const report = generateWithReport("easy", new SeededRng("report"), {
      logger,
    });
    assert.ok(report.attempts >= 1);
    const rejected = Object.values(report.rejects).reduce(
      (sum, n) => sum + (n ?? 0),
      0,
    );
    assert.equal(
      rejected,
      report.usedFallback ? report.attempts : report.attempts - 1,
    );
  });

  it("uses the supplied catalog", () => {
    const codes = ["AA", "BB", "CC", "DD", "EE", "FF"];
    const puzzle = generate("easy", new SeededRng("catalog"), {
      logger,
      codes,
    });
    for (const cell of puzzle.grid.flat()) {
      assert.ok(codes.includes(cell.code), `unexpected ${cell.code}`);
    }
  });
});

describe("generateFallback", () => {
  for (const difficulty of DIFFICULTIES) {
    it(`builds a valid ${difficulty} board`, () => {
      const tier = DIFFICULTY_TIERS[difficulty];
      const puzzle = generateFallback(
        tier.gridSize,
        tier.nominalBufferSize,
        difficulty,
        new SeededRng("fb"),
      );
      assert.ok(validatePuzzle(puzzle));
      assert.deepEqual(puzzle.solutionPath, [
        { row: 0, col: 0 },
        { row: 1, col: 0 },
        { row: 1, col: 1 },
      ]);
      assert.equal(puzzle.grid.length, tier.gridSize);
    });
  }

  it("has exactly one three-pick solution", () => {
    const puzzle = generateFallback(5, 7, "easy", new SeededRng("unique"));
    const result = solve(puzzle.grid, codesOf(puzzle), 3, 10);
    assert.equal(result.solutionCount, 1);
    assert.deepEqual(result.solutions[0], puzzle.solutionPath);
  });

  it("never shrinks below a 2x2 grid", () => {
    const puzzle = generateFallback(1, 3, "easy", new SeededRng("tiny"));
    assert.equal(puzzle.grid.length, 2);
    assert.ok(validatePuzzle(puzzle));
  });
});

describe("sampleDifficultyParams", () => {
  it("stays within the tier's ranges", () => {
    for (const difficulty of DIFFICULTIES) {
      const tier = DIFFICULTY_TIERS[difficulty];
      for (let i = 0; i < 20; i++) {
        const params = sampleDifficultyParams(
          tier,
          new SeededRng(`${difficulty}-${i}`),
        );
        assert.ok(params.sequenceCount >= tier.sequenceCount[0]);
        assert.ok(params.sequenceCount <= tier.sequenceCount[1]);
        assert.equal(params.sequenceLengths.length, params.sequenceCount);
        assert.ok(params.overlapCount <= params.sequenceCount - 1);
        assert.ok(params.overlapDepth <= tier.minSequenceLength - 1);
        for (const len of params.sequenceLengths) {
          assert.ok(len >= tier.minSequenceLength);
          assert.ok(len <= tier.maxSequenceLength);
        }
      }
    }
  });

  it("rejects a malformed tier", () => {
    const broken = { ...DIFFICULTY_TIERS.easy, gridSize: 0 };
    assert.throws(
      () => sampleDifficultyParams(broken, new SeededRng("broken")),
      /gridSize/,
    );
  });
});

describe("generate with bad configuration", () => {
  it("throws for an empty code catalog", () => {
    assert.throws(
      () => generate("easy", new SeededRng("empty"), { logger, codes: [] }),
      /catalog is empty/,
    );
  });
});
