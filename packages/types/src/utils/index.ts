export {
  CONVERTER_VERSION,
  DEFAULT_PROFILE,
  FIELD_LIMITS,
  MAX_SHEET_NAME_LENGTH,
  ROW_HEIGHT,
  OUTPUT_SUFFIX,
  type LimitedField,
} from './constants.js';
export { formatISODate } from './date.js';
export { parseControlNumber, compareControlKeys, compareControlNumbers, getSectionKey } from './control-number.js';
