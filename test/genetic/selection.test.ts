import { PopulationStore } from '../../src/genetic/genetic.population';
import {
  rouletteWheel,
  select,
  stochasticUniversal,
  tournament,
} from '../../src/genetic/genetic.selection';
import { GeneticConfigError } from '../../src/genetic/genetic.errors';
import { selection, type SelectionMethod } from '../../src/methods/selection';
import { config } from '../../src/config';
import { Random } from '../../src/utils/random';
import { ScriptedRandom } from '../utils/scriptedRandom';

const build = (scores: number[]) =>
  PopulationStore.from(scores.map((score, i) => ({ score, chromosome: [i] })));

const tally = (draw: () => number[], times: number) => {
  const counts = new Map<number, number>();
  for (let i = 0; i < times; i++) {
    const id = draw()[0];
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
};

describe('selection', () => {
  describe('tournament', () => {
    it('returns the highest-scored competitor', () => {
      // Arrange: ranks 0:1 1:3 2:5 3:9 (chromosomes [1] [3] [0] [2])
      const store = build([5, 1, 9, 3]);
      const random = new ScriptedRandom({ int: [0, 2, 1] });
      // Act
      const winner = tournament(store, 3, random);
      // Assert
      expect(winner).toEqual([0]);
      expect(random.calls.map((c) => c.args)).toEqual([
        [0, 3],
        [0, 3],
        [0, 3],
      ]);
    });

    it('keeps the first competitor on ties', () => {
      const store = build([2, 2]);
      const random = new ScriptedRandom({ int: [1, 0] });
      expect(tournament(store, 2, random)).toEqual([1]);
    });

    it('picks uniformly with size 1', () => {
      // Arrange
      const store = build([1, 50, 2, 100]);
      const random = new Random('tournament-uniform');
      // Act
      const counts = tally(() => tournament(store, 1, random), 4000);
      // Assert
      for (const id of [0, 1, 2, 3]) {
        expect(counts.get(id)).toBeGreaterThan(800);
        expect(counts.get(id)).toBeLessThan(1200);
      }
    });
  });

  describe('rouletteWheel', () => {
    it('picks proportionally to score', () => {
      // Arrange: total 4, chromosome [0] owns [0, 1]
      const store = build([1, 3]);
      const random = new Random('roulette');
      // Act
      const counts = tally(() => rouletteWheel(store, random), 4000);
      // Assert
      expect(counts.get(0)).toBeGreaterThan(850);
      expect(counts.get(0)).toBeLessThan(1150);
    });

    it('reads the wheel at the drawn position', () => {
      const store = build([1, 2, 3]);
      const random = new ScriptedRandom({ real: [2.5] });
      expect(rouletteWheel(store, random)).toEqual([1]);
      expect(random.calls).toEqual([{ method: 'real', args: [0, 6] }]);
    });

    it('picks the first entry when every score is zero', () => {
      const store = build([0, 0, 0]);
      expect(rouletteWheel(store, new Random(1))).toEqual([0]);
    });

    it('warns once about a non-positive total when warnings are on', () => {
      // Arrange
      config.warnings = true;
      const warn = jest.spyOn(console, 'warn');
      const store = build([0, 0]);
      // Act
      rouletteWheel(store, new Random(1));
      rouletteWheel(store, new Random(2));
      // Assert
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toMatch(/^ROULETTE_WHEEL selection received a total fitness of 0/);
      warn.mockRestore();
    });

    it('stays silent when warnings are off', () => {
      const warn = jest.spyOn(console, 'warn');
      rouletteWheel(build([0]), new Random(1));
      expect(warn).not.toHaveBeenCalled();
      warn.mockRestore();
    });
  });

  describe('stochasticUniversal', () => {
    it('reads evenly spaced pointers from one offset', () => {
      // Arrange: 50 entries of score 1, running sums 1..50
      const store = build(Array.from({ length: 50 }, () => 1));
      const random = new ScriptedRandom({ int: [4], real: [2.5] });
      // Act
      const picks = stochasticUniversal(store, random);
      // Assert: pointers 2.5, 15, 27.5, 40
      expect(picks).toEqual([[2], [14], [27], [39]]);
      expect(random.calls).toEqual([
        { method: 'int', args: [1, 5] },
        { method: 'real', args: [0, 12.5] },
      ]);
    });

    it('returns a single pick for fewer than ten entries', () => {
      const store = build([1, 2, 3, 4]);
      const random = new Random('sus-small');
      for (let i = 0; i < 20; i++)
        expect(stochasticUniversal(store, random)).toHaveLength(1);
    });

    it('returns between 1 and size / 10 picks', () => {
      const store = build(Array.from({ length: 50 }, (_, i) => i + 1));
      const random = new Random('sus-large');
      for (let i = 0; i < 50; i++) {
        const n = stochasticUniversal(store, random).length;
        expect(n).toBeGreaterThanOrEqual(1);
        expect(n).toBeLessThanOrEqual(5);
      }
    });

    it('terminates with zero total fitness', () => {
      const store = build(Array.from({ length: 20 }, () => 0));
      const random = new ScriptedRandom({ int: [2], real: [0] });
      expect(stochasticUniversal(store, random)).toEqual([[0], [0]]);
    });

    it('still yields one pick with a negative total', () => {
      // spacing -2, the only pointer (-1) lies past the total (-2)
      const store = build([-1, -1]);
      const random = new ScriptedRandom({ int: [1], real: [-1] });
      expect(stochasticUniversal(store, random)).toEqual([[0]]);
    });
  });

  describe('select', () => {
    it('returns copies of the stored chromosomes', () => {
      // Arrange
      const store = build([1, 2]);
      const random = new ScriptedRandom({ int: [1] });
      // Act
      const [picked] = select(store, { name: 'TOURNAMENT', size: 1 }, random);
      picked.push(42);
      // Assert
      expect(store.best().chromosome).toEqual([1]);
    });

    it('dispatches on the descriptor name', () => {
      const store = build([1, 3]);
      const random = new ScriptedRandom({ real: [0.5] });
      expect(select(store, selection.ROULETTE_WHEEL, random)).toEqual([[0]]);
    });

    it('rejects an unknown descriptor', () => {
      const method: SelectionMethod = { name: 'TOURNAMENT', size: 1 };
      Reflect.set(method, 'name', 'LOTTERY');
      expect(() => select(build([1]), method, new Random(1))).toThrow(
        GeneticConfigError
      );
      expect(() => select(build([1]), method, new Random(1))).toThrow(
        'Unknown selection type: {"name":"LOTTERY","size":1}'
      );
    });
  });
});
