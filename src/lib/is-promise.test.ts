import { expect, test } from 'vitest';
import { isPromise } from './is-promise';

test('isPromise', () => {
  expect(isPromise(Promise.resolve('healthy'))).toBe(true);
  expect(isPromise({ then: (): void => {} })).toBe(true);

  expect(isPromise(null)).toBe(false);
  expect(isPromise(undefined)).toBe(false);
  expect(isPromise('then')).toBe(false);
  expect(isPromise({ then: true })).toBe(false);
  expect(isPromise([])).toBe(false);
  expect(isPromise(() => {})).toBe(false);
});
