export { ChainError, type ChainErrorOptions } from "./core/chain-error"
export {
  configureErrors,
  DEFAULTS as ERRORS_DEFAULTS,
  type ErrorsConfig,
  getErrorsConfig,
  resetErrorsConfig,
} from "./core/config"
export { chainMessage, formatDefault, NON_ERROR_MESSAGE } from "./core/format/format-default"
export { type SerializeOptions, serializeError } from "./core/serialize-error"
export { captureStack, splitStack, stackTrace } from "./core/stack/capture-stack"
export {
  createError,
  createErrorf,
  createErrorfWithCode,
  createErrorWithCode,
  wrapError,
  wrapErrorf,
  wrapErrorfWithCode,
  wrapErrorWithCode,
} from "./core/utils/create-error"
export { errorChain, iterateChain } from "./core/utils/error-chain"
export { isChainError } from "./core/utils/is-chain-error"
export { toChainError } from "./core/utils/to-chain-error"
export { DEFAULT_ERROR_CODE } from "./ports/error"
export type {
  CapturedStack,
  ChainedError,
  ErrorCode,
  SerializedError,
} from "./ports/error"
