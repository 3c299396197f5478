import { RingBuffer } from './RingBuffer';

describe('RingBuffer', () => {
  it('should return entries newest first', () => {
    const buffer = new RingBuffer<number>(5);
    [1, 2, 3].forEach(n => buffer.push(n));

    expect(buffer.recent()).toEqual([3, 2, 1]);
    expect(buffer.size).toBe(3);
  });

  it('should drop the oldest entries once full', () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach(n => buffer.push(n));

    expect(buffer.recent()).toEqual([5, 4, 3]);
    expect(buffer.maxSize).toBe(3);
  });

  it('should filter before limiting', () => {
    const buffer = new RingBuffer<number>(10);
    [1, 2, 3, 4, 5, 6].forEach(n => buffer.push(n));

    expect(buffer.recent(2, n => n % 2 === 1)).toEqual([5, 3]);
  });

  it('should keep the newest entries when shrunk', () => {
    const buffer = new RingBuffer<number>(5);
    [1, 2, 3, 4, 5].forEach(n => buffer.push(n));

    buffer.resize(2);

    expect(buffer.recent()).toEqual([5, 4]);
  });

  it('should clear', () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push('a');
    buffer.clear();

    expect(buffer.recent()).toEqual([]);
  });

  it('should reject invalid capacities', () => {
    expect(() => new RingBuffer(0)).toThrow('RingBuffer capacity must be a positive integer, got 0');
    expect(() => new RingBuffer(1).resize(1.5)).toThrow(RangeError);
  });
});
