/**
 * contract-courier: deploy and call contracts on a Tendermint-style node,
 * with keys held by an external signing service.
 */

export * from './address'
export * from './config'
export * from './errors'
export * from './session'
export * from './version'

export * from './compiler/client'
export * from './contracts'
export * from './rpc/http'
export * from './rpc/node'
export * from './tx/build'
export * from './tx/confirm'
export * from './tx/encode'
export * from './tx/send'
export * from './types/abi'
export * from './types/core'
export * from './wallet/signer'

export { encodeCanonicalJson, type CanonicalValue } from './utils/canonical'
export { KeyedLock } from './utils/lock'
export { logger, setGlobalLogLevel, setLogHandler, type ILogger, type LogLevelName } from './utils/logger'
export { AbortError, HttpError, type FetchLike } from './utils/retry'
export { bytesToHex, hexToBytes, toWireHex } from './utils/bytes'
