import { formatStartValue, isValueType, sameStart, typedValueFromText, withStartValue } from '../valueTypes';

describe('typedValueFromText', () => {
  test('parses xs:double lexical forms for Real', () => {
    expect(typedValueFromText('Real', [], '1.5E-3')).toEqual({ type: 'Real', start: 0.0015, facets: [] });
    expect(typedValueFromText('Real', [], ' 42 ')?.start).toBe(42);
    expect(typedValueFromText('Real', [], 'INF')?.start).toBe(Infinity);
    expect(typedValueFromText('Real', [], '-INF')?.start).toBe(-Infinity);
    expect(typedValueFromText('Real', [], 'abc')).toBeNull();
    expect(typedValueFromText('Real', [], '')).toBeNull();
  });

  test('rejects non-integer and out-of-range Integer starts instead of truncating', () => {
    expect(typedValueFromText('Integer', [], '-12')?.start).toBe(-12);
    expect(typedValueFromText('Integer', [], '+5')?.start).toBe(5);
    expect(typedValueFromText('Integer', [], '1.5')).toBeNull();
    expect(typedValueFromText('Integer', [], '2147483648')).toBeNull();
    expect(typedValueFromText('Enumeration', [], '2')?.start).toBe(2);
  });

  test('reads xs:boolean and keeps strings verbatim', () => {
    expect(typedValueFromText('Boolean', [], '1')?.start).toBe(true);
    expect(typedValueFromText('Boolean', [], 'false')?.start).toBe(false);
    expect(typedValueFromText('Boolean', [], 'yes')).toBeNull();
    expect(typedValueFromText('String', [], ' a ')?.start).toBe(' a ');
  });

  test('leaves start undefined when absent and keeps facets', () => {
    const facets = [['unit', 'm'] as const];
    expect(typedValueFromText('Real', facets)).toEqual({ type: 'Real', facets });
  });
});

describe('withStartValue', () => {
  test('coerces input to the declared type', () => {
    expect(withStartValue({ type: 'Real', facets: [] }, 42)?.start).toBe(42);
    expect(withStartValue({ type: 'Real', facets: [] }, '3.25')?.start).toBe(3.25);
    expect(withStartValue({ type: 'Integer', facets: [] }, '7')?.start).toBe(7);
    expect(withStartValue({ type: 'Boolean', facets: [] }, 'true')?.start).toBe(true);
    expect(withStartValue({ type: 'String', facets: [] }, 'x')?.start).toBe('x');
  });

  test('rejects values of the wrong type', () => {
    expect(withStartValue({ type: 'Integer', facets: [] }, 4.2)).toBeNull();
    expect(withStartValue({ type: 'Real', facets: [] }, true)).toBeNull();
    expect(withStartValue({ type: 'Boolean', facets: [] }, 1)).toBeNull();
    expect(withStartValue({ type: 'String', facets: [] }, 5)).toBeNull();
  });
});

describe('formatStartValue', () => {
  test('writes schema lexical forms', () => {
    expect(formatStartValue({ type: 'Real', start: 1e21, facets: [] })).toBe('1e+21');
    expect(formatStartValue({ type: 'Real', start: -Infinity, facets: [] })).toBe('-INF');
    expect(formatStartValue({ type: 'Real', start: NaN, facets: [] })).toBe('NaN');
    expect(formatStartValue({ type: 'Boolean', start: true, facets: [] })).toBe('true');
    expect(formatStartValue({ type: 'Integer', facets: [] })).toBeUndefined();
  });
});

describe('helpers', () => {
  test('recognizes value element names', () => {
    expect(isValueType('Real')).toBe(true);
    expect(isValueType('Float64')).toBe(false);
  });

  test('treats NaN starts as equal', () => {
    expect(sameStart(NaN, NaN)).toBe(true);
    expect(sameStart(1, 1)).toBe(true);
    expect(sameStart('1', 1)).toBe(false);
  });
});
