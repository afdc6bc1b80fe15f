/**
 * Session configuration, read from environment variables and validated with zod.
 *
 *   COURIER_CHAIN_ID             chain identifier included in every sign-bytes payload (default: mychain)
 *   COURIER_NODE_URL             node RPC base URL (default: http://localhost:46657)
 *   COURIER_SIGNER_URL           key server base URL, exposing /sign and /pub (default: http://localhost:4767)
 *   COURIER_COMPILER_URL         compile endpoint (default: http://localhost:8091/compile)
 *   COURIER_REGISTRY_DIR         directory of per-contract record files (default: ~/.courier/<chain id>)
 *   COURIER_TX_FEE               default fee (default: 0)
 *   COURIER_TX_GAS_LIMIT         default gas limit (default: 1000)
 *   COURIER_TX_AMOUNT            default amount sent with each call tx (default: 1)
 *   COURIER_POLL_INTERVAL_MS     confirmation poll interval (default: 500)
 *   COURIER_CONFIRM_TIMEOUT_MS   confirmation deadline (default: 60000)
 *   COURIER_HTTP_TIMEOUT_MS      per-attempt HTTP timeout (default: 15000)
 *   COURIER_HTTP_RETRIES         retries for idempotent GETs (default: 3)
 *   COURIER_LOG_LEVEL            trace | debug | info | warn | error | silent (default: info)
 */

import * as os from 'node:os'
import * as path from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors'
import { HttpUrl, NonEmptyString, UIntBig, UIntNumber, parseOrThrow } from './utils/schema'

export const DEFAULTS = {
  chainId: 'mychain',
  nodeUrl: 'http://localhost:46657',
  signerUrl: 'http://localhost:4767',
  compilerUrl: 'http://localhost:8091/compile',
  fee: 0n,
  gasLimit: 1000n,
  amount: 1n,
  pollIntervalMs: 500,
  confirmTimeoutMs: 60_000,
  httpTimeoutMs: 15_000,
  httpRetries: 3,
  logLevel: 'info'
} as const

export const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent'])

export const CourierConfig = z.object({
  chainId: NonEmptyString,
  nodeUrl: HttpUrl,
  signerUrl: HttpUrl,
  compilerUrl: HttpUrl,
  registryDir: NonEmptyString,
  tx: z.object({
    fee: UIntBig,
    gasLimit: UIntBig,
    amount: UIntBig
  }),
  confirmation: z.object({
    pollIntervalMs: UIntNumber,
    timeoutMs: UIntNumber.refine((n) => n > 0, { message: 'must be positive' })
  }),
  http: z.object({
    timeoutMs: UIntNumber,
    retries: UIntNumber
  }),
  logLevel: LogLevel
})
export type CourierConfig = z.output<typeof CourierConfig>

/** Input accepted by `makeConfig`: everything optional, numbers as number/bigint/decimal string. */
export type CourierConfigInput = Partial<{
  chainId: string
  nodeUrl: string
  signerUrl: string
  compilerUrl: string
  registryDir: string
  tx: Partial<Record<'fee' | 'gasLimit' | 'amount', bigint | number | string>>
  confirmation: Partial<Record<'pollIntervalMs' | 'timeoutMs', number | string>>
  http: Partial<Record<'timeoutMs' | 'retries', number | string>>
  logLevel: string
}>

export function defaultRegistryDir(chainId: string): string {
  return path.join(os.homedir(), '.courier', chainId)
}

/** Fill defaults and validate. Throws ConfigError listing every invalid field. */
export function makeConfig(input: CourierConfigInput = {}): CourierConfig {
  const chainId = input.chainId ?? DEFAULTS.chainId
  const candidate = {
    chainId,
    nodeUrl: input.nodeUrl ?? DEFAULTS.nodeUrl,
    signerUrl: input.signerUrl ?? DEFAULTS.signerUrl,
    compilerUrl: input.compilerUrl ?? DEFAULTS.compilerUrl,
    registryDir: input.registryDir ?? defaultRegistryDir(chainId),
    tx: {
      fee: input.tx?.fee ?? DEFAULTS.fee,
      gasLimit: input.tx?.gasLimit ?? DEFAULTS.gasLimit,
      amount: input.tx?.amount ?? DEFAULTS.amount
    },
    confirmation: {
      pollIntervalMs: input.confirmation?.pollIntervalMs ?? DEFAULTS.pollIntervalMs,
      timeoutMs: input.confirmation?.timeoutMs ?? DEFAULTS.confirmTimeoutMs
    },
    http: {
      timeoutMs: input.http?.timeoutMs ?? DEFAULTS.httpTimeoutMs,
      retries: input.http?.retries ?? DEFAULTS.httpRetries
    },
    logLevel: input.logLevel ?? DEFAULTS.logLevel
  }
  return parseOrThrow(CourierConfig, candidate, (msg, error) => new ConfigError(`Invalid configuration: ${msg}`, { cause: error }))
}

/** Build the configuration from COURIER_* environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CourierConfig {
  const pick = (k: string) => {
    const v = env[k]
    return v === undefined || v.trim() === '' ? undefined : v.trim()
  }
  return makeConfig({
    chainId: pick('COURIER_CHAIN_ID'),
    nodeUrl: pick('COURIER_NODE_URL'),
    signerUrl: pick('COURIER_SIGNER_URL'),
    compilerUrl: pick('COURIER_COMPILER_URL'),
    registryDir: pick('COURIER_REGISTRY_DIR'),
    tx: {
      fee: pick('COURIER_TX_FEE'),
      gasLimit: pick('COURIER_TX_GAS_LIMIT'),
      amount: pick('COURIER_TX_AMOUNT')
    },
    confirmation: {
      pollIntervalMs: pick('COURIER_POLL_INTERVAL_MS'),
      timeoutMs: pick('COURIER_CONFIRM_TIMEOUT_MS')
    },
    http: {
      timeoutMs: pick('COURIER_HTTP_TIMEOUT_MS'),
      retries: pick('COURIER_HTTP_RETRIES')
    },
    logLevel: pick('COURIER_LOG_LEVEL')
  })
}
