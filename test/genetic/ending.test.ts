import { BEST_SCORE_WINDOW, isEvolutionOver } from '../../src/genetic/genetic.ending';
import { GeneticConfigError } from '../../src/genetic/genetic.errors';
import { ending, type EndingCriterion } from '../../src/methods/ending';

describe('isEvolutionOver', () => {
  describe('MAX_SCORE', () => {
    const criterion: EndingCriterion = { name: 'MAX_SCORE', score: 3 };

    it('fires once the best score reaches the threshold', () => {
      expect(isEvolutionOver(criterion, 2.99, [])).toBe(false);
      expect(isEvolutionOver(criterion, 3, [])).toBe(true);
      expect(isEvolutionOver(criterion, 4, [])).toBe(true);
    });

    it('leaves the history alone', () => {
      const history: number[] = [];
      isEvolutionOver(criterion, 1, history);
      expect(history).toEqual([]);
    });
  });

  describe('BEST_SCORE', () => {
    it('fires on the eleventh constant score', () => {
      // Arrange
      const history: number[] = [];
      const results: boolean[] = [];
      // Act
      for (let i = 0; i < 11; i++)
        results.push(isEvolutionOver(ending.BEST_SCORE, 5, history));
      // Assert
      expect(results.slice(0, 10).every((r) => !r)).toBe(true);
      expect(results[10]).toBe(true);
      expect(history).toHaveLength(BEST_SCORE_WINDOW);
    });

    it('never fires on strictly increasing scores', () => {
      const history: number[] = [];
      for (let score = 0; score < 100; score++)
        expect(isEvolutionOver(ending.BEST_SCORE, score, history)).toBe(false);
    });

    it('fires once improvement stalls for the whole window', () => {
      // Arrange: improvement up to 4, then flat
      const history: number[] = [];
      const scores = [1, 2, 3, 4, 4, 4, 4, 4, 4, 4, 4, 4, 4, 4];
      // Act
      const firedAt = scores.findIndex((s) => isEvolutionOver(ending.BEST_SCORE, s, history));
      // Assert: the window holds indices 3..12, all 4
      expect(firedAt).toBe(12);
    });
  });

  describe('BEST_SCORE with a falling best', () => {
    it('fires when nothing in the window beats its oldest entry', () => {
      // Arrange: a peak of 9 followed by lower scores
      const history: number[] = [];
      const scores = [1, 9, 2, 2, 2, 2, 2, 2, 2, 2, 2];
      // Act
      const results = scores.map((s) => isEvolutionOver(ending.BEST_SCORE, s, history));
      // Assert: index 10 evicts the 1, leaving [9, 2 x 9]
      expect(results.indexOf(true)).toBe(10);
      expect(history[0]).toBe(9);
    });

    it('keeps running while a later score beats the oldest one', () => {
      const history: number[] = [];
      const scores = [100, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
      expect(scores.some((s) => isEvolutionOver(ending.BEST_SCORE, s, history))).toBe(false);
    });
  });

  describe('NEVER_STOP', () => {
    it('never fires', () => {
      expect(isEvolutionOver(ending.NEVER_STOP, Number.MAX_VALUE, [])).toBe(false);
    });
  });

  it('rejects an unknown criterion', () => {
    const criterion: EndingCriterion = { name: 'NEVER_STOP' };
    Reflect.set(criterion, 'name', 'SOMETIMES');
    expect(() => isEvolutionOver(criterion, 0, [])).toThrow(GeneticConfigError);
  });
});
