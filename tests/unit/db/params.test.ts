import {
  PARAM_TYPE_TAGS,
  inferParamKind,
  isBindParam,
  paramTypes,
  toBindParam,
  toBindParams,
  toDriverValue
} from '../../../src/db/params';
import { BindError } from '../../../src/utils/errors';

describe('params', () => {
  describe('inferParamKind', () => {
    it('should classify integers, floats and strings', () => {
      expect(inferParamKind(42)).toBe('integer');
      expect(inferParamKind(-7)).toBe('integer');
      expect(inferParamKind(10n)).toBe('integer');
      expect(inferParamKind(3.5)).toBe('float');
      expect(inferParamKind('active')).toBe('text');
      expect(inferParamKind('')).toBe('text');
    });

    it('should treat every other value as blob', () => {
      expect(inferParamKind(null)).toBe('blob');
      expect(inferParamKind(true)).toBe('blob');
      expect(inferParamKind(Buffer.from('abc'))).toBe('blob');
      expect(inferParamKind(new Date(0))).toBe('blob');
    });

    it('should treat integers beyond the safe range as float', () => {
      expect(inferParamKind(2 ** 60)).toBe('float');
      expect(inferParamKind(Number.NaN)).toBe('float');
    });
  });

  describe('paramTypes', () => {
    it('should build one tag per parameter in order', () => {
      expect(paramTypes([1, 'active', 3.5])).toBe('isd');
    });

    it('should return an empty string for no parameters', () => {
      expect(paramTypes([])).toBe('');
    });

    it('should tag the catch-all kinds as b', () => {
      expect(paramTypes([null, Buffer.from([1]), false, 'x'])).toBe('bbbs');
    });

    it('should honour explicitly tagged parameters', () => {
      expect(paramTypes([{ kind: 'float', value: 2 }, { kind: 'text', value: '7' }])).toBe('ds');
    });

    it('should expose the tag table', () => {
      expect(PARAM_TYPE_TAGS).toEqual({ integer: 'i', float: 'd', text: 's', blob: 'b' });
    });
  });

  describe('toBindParam', () => {
    it('should wrap raw values in their tagged variant', () => {
      expect(toBindParam(5)).toEqual({ kind: 'integer', value: 5 });
      expect(toBindParam(0.25)).toEqual({ kind: 'float', value: 0.25 });
      expect(toBindParam('a')).toEqual({ kind: 'text', value: 'a' });
      expect(toBindParam(null)).toEqual({ kind: 'blob', value: null });
    });

    it('should pass tagged values through unchanged', () => {
      const tagged = { kind: 'integer' as const, value: 9n };
      expect(toBindParam(tagged)).toBe(tagged);
    });

    it('should reject a tagged value whose value does not fit its kind', () => {
      expect(() => toBindParam({ kind: 'integer', value: 'nine' }, 2)).toThrow(
        'Parameter 3 has kind "integer" but an incompatible value'
      );
    });

    it('should reject values that cannot be bound', () => {
      expect(() => toBindParam(undefined, 0)).toThrow(BindError);
      expect(() => toBindParam(undefined, 0)).toThrow('Parameter 1 cannot be bound: unsupported undefined value');
      expect(() => toBindParam({ name: 'x' }, 1)).toThrow('Parameter 2 cannot be bound: unsupported object value');
      expect(() => toBindParam([1, 2], 0)).toThrow('Parameter 1 cannot be bound: unsupported array value');
      expect(() => toBindParam(() => 1, 0)).toThrow('Parameter 1 cannot be bound: unsupported function value');
    });

    it('should carry the failing position on the error', () => {
      let caught: unknown;
      try {
        toBindParams([1, 'ok', undefined]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(BindError);
      expect(caught).toMatchObject({ stage: 'bind', context: { position: 2 } });
    });
  });

  describe('isBindParam', () => {
    it('should recognise only well-formed tagged values', () => {
      expect(isBindParam({ kind: 'blob', value: Buffer.from('x') })).toBe(true);
      expect(isBindParam({ kind: 'float', value: 1.5 })).toBe(true);
      expect(isBindParam({ kind: 'integer', value: 1.5 })).toBe(false);
      expect(isBindParam({ kind: 'unknown', value: 1 })).toBe(false);
      expect(isBindParam(new Date())).toBe(false);
      expect(isBindParam(null)).toBe(false);
    });
  });

  describe('toDriverValue', () => {
    it('should unwrap the value handed to the driver', () => {
      const buffer = Buffer.from('payload');
      expect(toDriverValue({ kind: 'blob', value: buffer })).toBe(buffer);
      expect(toBindParams(['two', 2.5]).map(toDriverValue)).toEqual(['two', 2.5]);
    });

    it('should send integer-tagged numbers as bigints', () => {
      expect(toBindParams([10, 3.5, 7n]).map(toDriverValue)).toEqual([10n, 3.5, 7n]);
      expect(toDriverValue({ kind: 'integer', value: 2 })).toBe(2n);
      expect(toDriverValue({ kind: 'float', value: 2 })).toBe(2);
    });
  });
});
