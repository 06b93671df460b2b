import { canonicalJson, fieldValuesEqual, isFieldMap, parseFieldMap } from '../../src/core/field-map';

describe('field maps', () => {
  it('should accept nested maps of scalar values', () => {
    expect(isFieldMap({ a: 'x', b: 1, c: true, d: null, e: { f: 2 } })).toBe(true);
  });

  it('should reject arrays, non-finite numbers and class instances', () => {
    expect(isFieldMap({ a: [1] })).toBe(false);
    expect(isFieldMap({ a: Infinity })).toBe(false);
    expect(isFieldMap({ a: new Date(0) })).toBe(false);
    expect(isFieldMap([])).toBe(false);
  });

  it('should parse only JSON objects that are field maps', () => {
    expect(parseFieldMap('{"name":"Aspirin","meta":{"a":1}}')).toEqual({ name: 'Aspirin', meta: { a: 1 } });
    expect(parseFieldMap('[1,2]')).toBeNull();
    expect(parseFieldMap('{broken')).toBeNull();
  });

  it('should compare nested values by content', () => {
    expect(fieldValuesEqual({ a: 1, b: { c: 'x' } }, { b: { c: 'x' }, a: 1 })).toBe(true);
    expect(fieldValuesEqual({ a: 1 }, { a: 1, b: null })).toBe(false);
    expect(fieldValuesEqual(null, undefined)).toBe(false);
    expect(fieldValuesEqual(1, '1')).toBe(false);
  });

  it('should encode with sorted keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"y":0,"z":1}]},"b":1}',
    );
  });

  it('should skip undefined properties', () => {
    expect(canonicalJson({ a: undefined, b: 1 })).toBe('{"b":1}');
  });
});
