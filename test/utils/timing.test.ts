import { formatDuration, timed } from '../../src/utils/timing';

describe('timing', () => {
  describe('formatDuration', () => {
    it.each<[number, string]>([
      [12.345, '12.345ms'],
      [0.5, '0.5ms'],
      [1500, '1.500s'],
      [59_999, '59.999s'],
      [125_250, '2m 5.250s'],
      [999.9996, '1.000s'],
      [59_999.9, '1m 0.000s'],
      [119_999.9, '2m 0.000s'],
    ])('formats %p ms as %s', (ms, expected) => {
      expect(formatDuration(ms)).toBe(expected);
    });
  });

  it('timed returns the result and a non-negative duration', () => {
    const { result, elapsedMs } = timed(() => 6 * 7);
    expect(result).toBe(42);
    expect(elapsedMs).toBeGreaterThanOrEqual(0);
  });
});
