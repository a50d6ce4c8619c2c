import { SeededRNG } from '../../src/shared/utils/rng';

describe('SeededRNG', () => {
  it('produces the mulberry32 sequence for a seed', () => {
    const rng = new SeededRNG(1);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([
      0.6270739405881613, 0.002735721180215478, 0.5274470399599522,
    ]);
  });

  it('is reproducible per seed', () => {
    const a = new SeededRNG(99);
    const b = new SeededRNG(99);
    for (let i = 0; i < 50; i += 1) {
      expect(a.next()).toBe(b.next());
    }
  });

  it('draws integers from a half-open range', () => {
    const digits = new SeededRNG(42);
    expect(Array.from({ length: 5 }, () => digits.nextInt(0, 10))).toEqual([6, 4, 8, 6, 1]);

    const offset = new SeededRNG(7);
    expect(Array.from({ length: 5 }, () => offset.nextInt(3, 9))).toEqual([3, 3, 8, 7, 6]);
  });

  it('rejects an empty integer range', () => {
    expect(() => new SeededRNG(1).nextInt(5, 5)).toThrow(RangeError);
  });

  it('picks list elements by the integer draw', () => {
    const rng = new SeededRNG(42);
    expect(rng.pick(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'])).toBe('g');
    expect(() => rng.pick([])).toThrow('Cannot pick from an empty list');
  });
});
