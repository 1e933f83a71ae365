import { describe, it, expect } from 'vitest';
import {
  computeTeamWeights,
  denseRankDescending,
  qualifyingSequence,
  MIN_WEIGHT,
  type QualifyingHistoryRow,
} from './qualifying.js';
import { createRng, type RandomSource } from './random.js';

// -- Helpers --

function row(carNumber: number, driver: string, team: string, qualifyingPoints: number): QualifyingHistoryRow {
  return { carNumber, driver, team, qualifyingPoints };
}

/** Replays the given draws in order. */
function scripted(values: number[]): RandomSource {
  let i = 0;
  return () => values[i++ % values.length];
}

// -- computeTeamWeights --

describe('computeTeamWeights', () => {
  it('sums qualifying points per car across races', () => {
    const weights = computeTeamWeights([
      row(1, 'Ann', 'A', 10),
      row(2, 'Ben', 'A', 5),
      row(1, 'Ann', 'A', 5),
    ]);

    expect(weights.map(w => [w.carNumber, w.qualifyingScore])).toEqual([
      [1, 15],
      [2, 5],
    ]);
    expect(weights[0].teamPoints).toBe(20);
    expect(weights[0].weight).toBeCloseTo(0.75);
    expect(weights[1].weight).toBeCloseTo(0.25);
  });

  it('gives zero-score cars the equal-split weight', () => {
    const weights = computeTeamWeights([
      row(1, 'Ann', 'A', 100),
      row(2, 'Ben', 'A', 0),
      row(3, 'Cal', 'A', 0),
    ]);

    expect(weights[0].weight).toBe(1);
    expect(weights[1].weight).toBeCloseTo(1 / 3);
    expect(weights[2].weight).toBeCloseTo(1 / 3);
  });

  it('splits evenly when the whole team has zero points', () => {
    const weights = computeTeamWeights([
      row(3, 'Cal', 'B', 0),
      row(4, 'Dee', 'B', 0),
    ]);

    expect(weights.map(w => w.weight)).toEqual([0.5, 0.5]);
    expect(weights[0].teamPoints).toBe(0);
  });

  it('clamps weights into [MIN_WEIGHT, 1]', () => {
    const weights = computeTeamWeights([
      row(1, 'Ann', 'A', 10),
      row(2, 'Ben', 'A', -5),
    ]);

    // team total 5: shares are 2 and -1
    expect(weights[0].weight).toBe(1);
    expect(weights[1].weight).toBe(MIN_WEIGHT);
  });

  it('keeps the same number with different drivers as separate cars', () => {
    const weights = computeTeamWeights([
      row(1, 'Ann', 'A', 4),
      row(1, 'Zed', 'A', 4),
    ]);
    expect(weights).toHaveLength(2);
  });
});

// -- denseRankDescending --

describe('denseRankDescending', () => {
  it('ranks the largest value first', () => {
    expect(denseRankDescending([0.2, 0.9, 0.5])).toEqual([3, 1, 2]);
  });

  it('gives equal values the same rank without gaps', () => {
    expect(denseRankDescending([0.5, 0.9, 0.5, 0.1])).toEqual([2, 1, 2, 3]);
  });
});

// -- qualifyingSequence --

describe('qualifyingSequence', () => {
  it('returns nothing for an empty season', () => {
    expect(qualifyingSequence([], createRng(1))).toEqual([]);
  });

  it('ranks each team by its weighted draw', () => {
    const history = [
      row(1, 'Ann', 'A', 30),
      row(2, 'Ben', 'A', 10),
      row(3, 'Cal', 'B', 0),
      row(4, 'Dee', 'B', 0),
    ];

    // keys: car1 0.5^(4/3) ≈ 0.397, car2 0.9^4 ≈ 0.656, car3 0.2^2 = 0.04, car4 0.7^2 = 0.49
    const qualifiers = qualifyingSequence(history, scripted([0.5, 0.9, 0.2, 0.7]));

    expect(qualifiers).toEqual([
      { carNumber: 2, driver: 'Ben', team: 'A', teamPosition: 1 },
      { carNumber: 1, driver: 'Ann', team: 'A', teamPosition: 2 },
      { carNumber: 4, driver: 'Dee', team: 'B', teamPosition: 1 },
      { carNumber: 3, driver: 'Cal', team: 'B', teamPosition: 2 },
    ]);
  });

  it('keeps at most four cars per team', () => {
    const history = [1, 2, 3, 4, 5].map(n => row(n, `Driver ${n}`, 'A', 0));
    const qualifiers = qualifyingSequence(history, scripted([0.1, 0.2, 0.3, 0.4, 0.5]));

    expect(qualifiers.map(q => [q.carNumber, q.teamPosition])).toEqual([
      [5, 1],
      [4, 2],
      [3, 3],
      [2, 4],
    ]);
  });

  it('gives equal draws the same team position', () => {
    const history = [row(1, 'Ann', 'A', 0), row(2, 'Ben', 'A', 0)];
    const qualifiers = qualifyingSequence(history, scripted([0.5, 0.5]));
    expect(qualifiers.map(q => q.teamPosition)).toEqual([1, 1]);
  });

  it('favors the car with the larger share of team points', () => {
    const history = [row(1, 'Ann', 'A', 90), row(2, 'Ben', 'A', 10)];
    const rng = createRng(2024);

    let annFirst = 0;
    const trials = 2000;
    for (let i = 0; i < trials; i++) {
      const [first] = qualifyingSequence(history, rng);
      if (first.carNumber === 1) annFirst++;
    }

    // expected share is 0.9
    expect(annFirst / trials).toBeGreaterThan(0.85);
    expect(annFirst).toBeLessThan(trials);
  });
});
