import { strict as assert } from "assert";
import {
  SeededRng,
  createCell,
  emptyGrid,
  positionKey,
} from "@breachgrid/core";
import type { FillStrategy, Grid, Position } from "@breachgrid/core";
import {
  fillGridByStrategy,
  resolveFillStrategy,
  selectCodePool,
} from "./fill";

const POOL = ["1C", "BD", "55", "E9", "7A", "FF"];

function deceptive(decoyDensity: number): FillStrategy {
  return {
    kind: "deceptive",
    decoyDensity,
    sequenceCodes: new Set(["1C", "BD"]),
  };
}

function partialGrid(size: number, path: Position[], codes: string[]): Grid {
  const grid = emptyGrid(size);
  path.forEach((pos, i) => {
    grid[pos.row][pos.col] = createCell(codes[i], pos.row, pos.col);
  });
  return grid;
}

function offPathCodes(grid: Grid, path: Position[]): string[] {
  const keys = new Set(path.map(positionKey));
  return grid
    .flat()
    .filter((cell) => !keys.has(positionKey(cell)))
    .map((cell) => cell.code);
}

describe("fillGridByStrategy", () => {
  const path = [
    { row: 0, col: 0 },
    { row: 1, col: 0 },
  ];

  it("preserves path cells and fills everything else", () => {
    const grid = partialGrid(3, path, ["1C", "BD"]);
    const filled = fillGridByStrategy(
      grid,
      path,
      { kind: "forgiving", solutionCodeDensity: 0.5 },
      POOL,
      new SeededRng("preserve"),
    );
    assert.equal(filled[0][0].code, "1C");
    assert.equal(filled[1][0].code, "BD");
    assert.equal(filled.length, 3);
    for (const row of filled) {
      assert.equal(row.length, 3);
      for (const cell of row) assert.notEqual(cell.code, "");
    }
  });

  it("does not modify the input grid", () => {
    const grid = partialGrid(3, path, ["1C", "BD"]);
    fillGridByStrategy(
      grid,
      path,
      { kind: "moderate", redHerringDensity: 0.15 },
      POOL,
      new SeededRng("pure"),
    );
    assert.equal(grid[2][2].code, "");
  });

  it("forgiving at full density uses only path codes", () => {
    for (let i = 0; i < 10; i++) {
      const grid = partialGrid(3, path, ["1C", "BD"]);
      const filled = fillGridByStrategy(
        grid,
        path,
        { kind: "forgiving", solutionCodeDensity: 1 },
        POOL,
        new SeededRng(`dense-${i}`),
      );
      for (const code of offPathCodes(filled, path)) {
        assert.ok(code === "1C" || code === "BD", `unexpected ${code}`);
      }
    }
  });

  it("moderate at zero density draws from the pool only", () => {
    const grid = partialGrid(3, path, ["1C", "BD"]);
    const filled = fillGridByStrategy(
      grid,
      path,
      { kind: "moderate", redHerringDensity: 0 },
      ["FF"],
      new SeededRng("pool-only"),
    );
    assert.deepEqual(offPathCodes(filled, path), Array<string>(7).fill("FF"));
  });

  it("deceptive at zero density keeps sequence codes off the board", () => {
    const deceptivePath = [
      { row: 0, col: 2 },
      { row: 1, col: 2 },
    ];
    const grid = partialGrid(5, deceptivePath, ["1C", "BD"]);
    const filled = fillGridByStrategy(
      grid,
      deceptivePath,
      deceptive(0),
      POOL,
      new SeededRng("no-decoys"),
    );
    for (const code of offPathCodes(filled, deceptivePath)) {
      assert.ok(code !== "1C" && code !== "BD", `decoy ${code} placed`);
    }
  });

  it("deceptive at full density puts decoys beside the path only", () => {
    const deceptivePath = [
      { row: 0, col: 2 },
      { row: 1, col: 2 },
    ];
    const adjacent = new Set(["0,1", "0,3", "1,1", "1,3", "2,2"]);
    const grid = partialGrid(5, deceptivePath, ["1C", "BD"]);
    const filled = fillGridByStrategy(
      grid,
      deceptivePath,
      deceptive(1),
      POOL,
      new SeededRng("all-decoys"),
    );
    const onPath = new Set(deceptivePath.map(positionKey));
    for (const cell of filled.flat()) {
      const key = positionKey(cell);
      if (onPath.has(key)) continue;
      const isDecoy = cell.code === "1C" || cell.code === "BD";
      assert.equal(
        isDecoy,
        adjacent.has(key),
        `cell ${key} holds ${cell.code}`,
      );
    }
  });
});

describe("selectCodePool", () => {
  it("draws distinct codes from the catalog", () => {
    const pool = selectCodePool(POOL, 4, new SeededRng("pool"));
    assert.equal(pool.length, 4);
    assert.equal(new Set(pool).size, 4);
    for (const code of pool) assert.ok(POOL.includes(code));
  });

  it("never asks for more codes than the catalog has", () => {
    const pool = selectCodePool(["1C", "BD"], 5, new SeededRng("small"));
    assert.equal(pool.length, 2);
  });
});

describe("resolveFillStrategy", () => {
  it("collects sequence codes for deceptive fills", () => {
    const strategy = resolveFillStrategy({ kind: "deceptive", density: 0.3 }, [
      ["1C", "BD"],
      ["BD", "55"],
    ]);
    assert.equal(strategy.kind, "deceptive");
    if (strategy.kind === "deceptive") {
      const codes = [...strategy.sequenceCodes].sort();
      assert.deepEqual(codes, ["1C", "55", "BD"]);
      assert.equal(strategy.decoyDensity, 0.3);
    }
  });

  it("maps forgiving density onto solution codes", () => {
    const strategy = resolveFillStrategy({ kind: "forgiving", density: 0.5 }, [
      ["1C"],
    ]);
    assert.deepEqual(strategy, { kind: "forgiving", solutionCodeDensity: 0.5 });
  });
});
