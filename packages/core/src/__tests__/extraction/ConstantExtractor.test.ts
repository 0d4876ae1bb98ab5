import {
  tryEvaluateConstant,
  tryGetIntegerConstant,
  tryGetKeyConstant,
} from '../../extraction/ConstantExtractor';
import { Expressions as E } from '../../expression/Expressions';
import { dateDomain, numberDomain, stringDomain } from '../../range/Orderable';

describe('ConstantExtractor', () => {
  describe('tryEvaluateConstant', () => {
    it('should evaluate literals', () => {
      expect(tryEvaluateConstant(E.constant('abc'))).toEqual({ found: true, value: 'abc' });
      expect(tryEvaluateConstant(E.constant(null))).toEqual({ found: true, value: null });
    });

    it('should evaluate arithmetic over literals', () => {
      expect(tryEvaluateConstant(E.multiply(E.add(E.constant(1), E.constant(2)), E.constant(4)))).toEqual({
        found: true,
        value: 12,
      });
    });

    it('should evaluate captured values', () => {
      expect(tryEvaluateConstant(E.captured('threshold', () => 7))).toEqual({ found: true, value: 7 });
    });

    it('should reject anything reading the input record', () => {
      expect(tryEvaluateConstant(E.parameter())).toEqual({ found: false });
      expect(tryEvaluateConstant(E.key('id'))).toEqual({ found: false });
      expect(tryEvaluateConstant(E.add(E.key('id'), E.constant(1)))).toEqual({ found: false });
    });

    it('should not evaluate captured values alongside the input', () => {
      const read = jest.fn(() => 1);
      expect(tryEvaluateConstant(E.add(E.captured('offset', read), E.key('id')))).toEqual({ found: false });
      expect(read).not.toHaveBeenCalled();
    });
  });

  describe('tryGetKeyConstant', () => {
    it('should accept values of the domain', () => {
      expect(tryGetKeyConstant(E.constant(5), numberDomain)).toEqual({ found: true, value: 5 });
      expect(tryGetKeyConstant(E.constant('m'), stringDomain)).toEqual({ found: true, value: 'm' });
    });

    it('should reject values outside the domain', () => {
      expect(tryGetKeyConstant(E.constant('5'), numberDomain)).toEqual({ found: false });
      expect(tryGetKeyConstant(E.constant(null), stringDomain)).toEqual({ found: false });
      expect(tryGetKeyConstant(E.constant(new Date(NaN)), dateDomain)).toEqual({ found: false });
    });
  });

  describe('tryGetIntegerConstant', () => {
    it('should accept integers', () => {
      expect(tryGetIntegerConstant(E.constant(0))).toEqual({ found: true, value: 0 });
      expect(tryGetIntegerConstant(E.negate(E.constant(3)))).toEqual({ found: true, value: -3 });
    });

    it('should reject fractions and non-numbers', () => {
      expect(tryGetIntegerConstant(E.constant(0.5))).toEqual({ found: false });
      expect(tryGetIntegerConstant(E.constant('0'))).toEqual({ found: false });
      expect(tryGetIntegerConstant(E.constant(0n))).toEqual({ found: false });
    });
  });
});
