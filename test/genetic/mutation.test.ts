import { mutate } from '../../src/genetic/genetic.mutation';
import { Random } from '../../src/utils/random';
import { ScriptedRandom } from '../utils/scriptedRandom';

describe('mutate', () => {
  const nine = () => 9;

  it('rewrites the drawn span in place', () => {
    // Arrange
    const chromosome = [0, 0, 0, 0];
    const random = new ScriptedRandom({ next: [0], int: [1, 3] });
    // Act
    const span = mutate(chromosome, 0.5, nine, random);
    // Assert
    expect(span).toEqual({ begin: 1, end: 3 });
    expect(chromosome).toEqual([0, 9, 9, 0]);
    expect(random.calls).toEqual([
      { method: 'next', args: [] },
      { method: 'int', args: [0, 3] },
      { method: 'int', args: [1, 4] },
    ]);
  });

  it('does nothing when the draw is not below the probability', () => {
    const chromosome = [0, 0];
    const random = new ScriptedRandom({ next: [0.5] });
    expect(mutate(chromosome, 0.5, nine, random)).toBeUndefined();
    expect(chromosome).toEqual([0, 0]);
    expect(random.calls).toHaveLength(1);
  });

  it('never fires with probability 0', () => {
    const random = new Random('never');
    const chromosome = [1, 2, 3];
    for (let i = 0; i < 200; i++)
      expect(mutate(chromosome, 0, nine, random)).toBeUndefined();
    expect(chromosome).toEqual([1, 2, 3]);
  });

  it('rewrites nothing on an empty span', () => {
    const chromosome = [1, 2, 3];
    const span = mutate(chromosome, 1, nine, new ScriptedRandom({ next: [0.3], int: [2, 2] }));
    expect(span).toEqual({ begin: 2, end: 2 });
    expect(chromosome).toEqual([1, 2, 3]);
  });

  it('handles a single-gene chromosome', () => {
    const chromosome = [1];
    mutate(chromosome, 1, nine, new ScriptedRandom({ next: [0], int: [0, 1] }));
    expect(chromosome).toEqual([9]);
  });

  it('never changes the length', () => {
    const random = new Random('lengths');
    for (let i = 0; i < 100; i++) {
      const chromosome = Array.from({ length: random.int(1, 10) }, () => 0);
      const length = chromosome.length;
      mutate(chromosome, 1, nine, random);
      expect(chromosome).toHaveLength(length);
    }
  });
});
