export {
  addDecimal,
  compareDecimal,
  decimalEquals,
  decimalScale,
  decimalSchema,
  divideDecimal,
  decimalValueSchema,
  DecimalFormatError,
  MAX_DECIMAL_EXPONENT,
  formatDecimal,
  isDecimal,
  isMultipleOf,
  isNegativeDecimal,
  isZeroDecimal,
  minDecimal,
  multiplyDecimal,
  normalizeDecimal,
  parseDecimal,
  subtractDecimal,
  tryParseDecimal,
  ZERO,
  type Decimal,
} from "./decimal";
