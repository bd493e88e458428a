import { RecentLineSet } from '../recent-lines';

describe('RecentLineSet', () => {
  it('should report a repeated line as already seen', () => {
    const recent = new RecentLineSet(3);

    expect(recent.remember('<Steve> hi')).toBe(true);
    expect(recent.remember('<Steve> hi')).toBe(false);
    expect(recent.size).toBe(1);
  });

  it('should compare lines after trimming', () => {
    const recent = new RecentLineSet(3);
    recent.remember('<Steve> hi');

    expect(recent.has('  <Steve> hi\r')).toBe(true);
  });

  it('should forget the oldest line once full', () => {
    const recent = new RecentLineSet(2);
    recent.remember('a');
    recent.remember('b');
    recent.remember('c');

    expect(recent.has('a')).toBe(false);
    expect(recent.has('b')).toBe(true);
    expect(recent.has('c')).toBe(true);
    expect(recent.size).toBe(2);
    expect(recent.remember('a')).toBe(true);
  });

  it('should not advance when a duplicate is offered', () => {
    const recent = new RecentLineSet(2);
    recent.remember('a');
    recent.remember('b');
    recent.remember('b');
    recent.remember('c');

    // Only "c" displaced anything, and it displaced "a"
    expect(recent.has('a')).toBe(false);
    expect(recent.has('b')).toBe(true);
  });

  it('should start over after clear', () => {
    const recent = new RecentLineSet(2);
    recent.remember('a');
    recent.clear();

    expect(recent.size).toBe(0);
    expect(recent.remember('a')).toBe(true);
  });

  it('should reject a capacity below one', () => {
    expect(() => new RecentLineSet(0)).toThrow(
      'Capacity must be a positive integer, got 0'
    );
  });
});
