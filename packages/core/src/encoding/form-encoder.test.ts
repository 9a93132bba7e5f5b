import { encodeForm } from './form-encoder.js';

describe('encodeForm', () => {
  test('joins pairs in insertion order', () => {
    expect(encodeForm({ a: '1', b: 'x y' })).toBe('a=1&b=x%20y');
  });

  test('returns an empty string for an empty map', () => {
    expect(encodeForm({})).toBe('');
  });

  test('encodes a single pair without a separator', () => {
    expect(encodeForm({ q: 'search' })).toBe('q=search');
  });

  test('percent-encodes reserved characters in keys and values', () => {
    expect(encodeForm({ 'a&b': 'c=d', path: '/x?y' })).toBe(
      'a%26b=c%3Dd&path=%2Fx%3Fy',
    );
  });

  test('percent-encodes non-ASCII values as UTF-8', () => {
    expect(encodeForm({ name: 'café' })).toBe('name=caf%C3%A9');
  });

  test('keeps empty values', () => {
    expect(encodeForm({ empty: '' })).toBe('empty=');
  });
});
