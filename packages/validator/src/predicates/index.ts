export { isEmpty } from './presence.js';
export { isNotAlpha, isNotAlphaNumeric, isNotAscii, isNotNumeric, isNotString } from './shape.js';
export {
  DATE_LAYOUTS,
  isDateLayout,
  isNotDatetime,
  isNotEmail,
  isNotGhCard,
  isNotGhGps,
  isNotPhone,
  isNotPhoneWithCode,
  isNotUsername,
  type DateLayout,
} from './format.js';
export { isNotFloat, isNotInt, isNotUint } from './numeric.js';
export {
  byteLength,
  isNotBetween,
  isNotEqual,
  isNotFrom,
  isNotMax,
  isNotMin,
  parseBound,
  parseRange,
} from './comparative.js';
export { isNotEnum, isNotSame } from './membership.js';
export {
  IMAGE_EXTENSIONS,
  isNotAllowedExtension,
  isNotReadable,
  isOverSizeLimit,
  parseExtensions,
  parseSizeLimit,
  type SizeLimit,
  type SizeUnit,
} from './file.js';
