/**
 * Error taxonomy shared by the alphabet loader, the validator and the ciphers.
 */

export {
  CipherError,
  CipherUsageError,
  AlphabetError,
  AlphabetNotFoundError,
  isCipherError,
  type CipherErrorKind,
  type AlphabetErrorReason,
} from "./cipher-errors.js";
