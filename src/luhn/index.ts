export {
  checkCardNumber,
  isValidLuhn,
  isValidLuhnStrict,
  toDigit,
  type CheckMode,
} from "./checksum.js";
