import { BoundedHistory } from '../../state/history';

describe('BoundedHistory', () => {
  test('evicts the oldest entries first once full', () => {
    const history = new BoundedHistory<number>(3);
    history.appendAll([1, 2]);
    history.appendAll([3, 4, 5]);

    expect(history.length).toBe(3);
    expect(history.toArray()).toEqual([3, 4, 5]);
  });

  test('keeps only the newest initial entries', () => {
    const history = new BoundedHistory<string>(2, ['a', 'b', 'c']);
    expect(history.toArray()).toEqual(['b', 'c']);
  });

  test('tail returns the newest entries in insertion order', () => {
    const history = new BoundedHistory<number>(10, [1, 2, 3, 4]);
    expect(history.tail(2)).toEqual([3, 4]);
    expect(history.tail(0)).toEqual([1, 2, 3, 4]);
    expect(history.tail(50)).toEqual([1, 2, 3, 4]);
  });

  test('returned arrays are copies', () => {
    const history = new BoundedHistory<number>(5, [1]);
    history.toArray().push(99);
    expect(history.toArray()).toEqual([1]);
  });

  test('rejects a capacity that is not a positive integer', () => {
    expect(() => new BoundedHistory<number>(0)).toThrow(RangeError);
    expect(() => new BoundedHistory<number>(1.5)).toThrow(RangeError);
  });
});
