export { getKeyRange, getNegationOf } from './KeyRangeExtractor';
export {
  tryEvaluateConstant,
  tryGetKeyConstant,
  tryGetIntegerConstant,
  type ConstantResult,
} from './ConstantExtractor';
