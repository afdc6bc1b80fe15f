/**
 * Session: the configured set of clients every flow runs against.
 *
 *   const session = createSession(loadConfig())
 *   await assertChainId(session)
 *   const { record } = await deployContract(session, source, { from: ADDRESS })
 */

import { CompilerClient } from './compiler/client'
import { loadConfig, type CourierConfig } from './config'
import { FileContractRegistry, type ContractRegistry } from './contracts/registry'
import { ChainQueryError } from './errors'
import { NodeClient } from './rpc/node'
import type { HttpClientOptions } from './rpc/http'
import { KeyedLock } from './utils/lock'
import { logger, setGlobalLogLevel, type ILogger } from './utils/logger'
import type { FetchLike } from './utils/retry'
import { RemoteSigner, type Signer } from './wallet/signer'

export interface Session {
  readonly config: CourierConfig
  readonly node: NodeClient
  readonly signer: Signer
  readonly compiler: CompilerClient
  readonly registry: ContractRegistry
  /** Serialises submissions per sender and registry updates per contract. */
  readonly locks: KeyedLock
  readonly log: ILogger
}

export interface SessionOverrides {
  /** fetch used by every HTTP client (tests inject a fake). */
  fetch?: FetchLike
  signer?: Signer
  registry?: ContractRegistry
  log?: ILogger
}

export function createSession(config: CourierConfig = loadConfig(), overrides: SessionOverrides = {}): Session {
  setGlobalLogLevel(config.logLevel)
  const log = overrides.log ?? logger('courier')
  const http: HttpClientOptions = {
    timeoutMs: config.http.timeoutMs,
    retries: config.http.retries,
    fetch: overrides.fetch
  }
  return {
    config,
    node: new NodeClient(config.nodeUrl, { ...http, log: log.child('node') }),
    signer: overrides.signer ?? new RemoteSigner(config.signerUrl, { ...http, log: log.child('signer') }),
    compiler: new CompilerClient(config.compilerUrl, { ...http, log: log.child('compiler') }),
    registry: overrides.registry ?? new FileContractRegistry(config.registryDir),
    locks: new KeyedLock(),
    log
  }
}

/** Fails when the node serves a different chain than the one sign bytes are bound to. */
export async function assertChainId(session: Pick<Session, 'config' | 'node'>): Promise<void> {
  const { chainId } = await session.node.getGenesis()
  if (chainId !== session.config.chainId) {
    throw new ChainQueryError(`Node serves chain "${chainId}", session is configured for "${session.config.chainId}"`, {
      endpoint: session.node.http.url('/genesis'),
      context: { expected: session.config.chainId, actual: chainId }
    })
  }
}
