import { describe, expect, test } from 'vitest'
import { BroadcastError, ChainQueryError } from '../src/errors'
import { NodeClient } from '../src/rpc/node'
import { attachSignature, buildCallTx } from '../src/tx/build'
import { CONTRACT, DEPLOYER, envelope, errorEnvelope, fakeFetch, jsonResponse, type FakeHandler } from './fakes'

function node(handler: FakeHandler, retries = 0) {
  const fake = fakeFetch(handler)
  const client = new NodeClient('http://node.test:46657/', {
    fetch: fake.fetch,
    retries,
    backoff: { minDelay: 1, jitter: 'none' }
  })
  return { client, calls: fake.calls }
}

function signedDeploy() {
  const tx = buildCallTx({
    account: { address: DEPLOYER, sequence: 0n },
    payload: '6060',
    fee: 0n,
    gasLimit: 1000n,
    amount: 1n
  })
  return attachSignature(tx, { publicKey: 'AA', signature: 'BB' })
}

describe('NodeClient reads', () => {
  test('getAccount sends the address JSON-quoted and parses sequence and code', async () => {
    const { client, calls } = node(() =>
      jsonResponse(envelope({ account: { address: DEPLOYER, sequence: 7, code: '6001abcd' } }))
    )
    const account = await client.getAccount(DEPLOYER.toLowerCase())
    expect(account).toEqual({ address: DEPLOYER, sequence: 7n, code: '6001ABCD' })
    expect(calls[0].url.pathname).toBe('/get_account')
    expect(calls[0].url.searchParams.get('address')).toBe(`"${DEPLOYER}"`)
  })

  test('an account that never transacted has sequence 0 and no code', async () => {
    const { client } = node(() => jsonResponse(envelope({ account: null })))
    expect(await client.getSequence(DEPLOYER)).toBe(0n)
    expect(await client.getCode(DEPLOYER)).toBe('')
  })

  test('getLatestHeight reads latest_block_height from /status', async () => {
    const { client, calls } = node(() => jsonResponse(envelope({ latest_block_height: 42, latest_block_hash: 'AB' })))
    expect(await client.getLatestHeight()).toBe(42)
    expect(calls[0].url.pathname).toBe('/status')
  })

  test('getGenesis returns the chain id', async () => {
    const { client } = node(() => jsonResponse(envelope({ genesis: { chain_id: 'mychain', validators: [] } })))
    expect((await client.getGenesis()).chainId).toBe('mychain')
  })

  test('an error envelope becomes ChainQueryError', async () => {
    const { client } = node(() => jsonResponse(errorEnvelope('account lookup failed')))
    await expect(client.getSequence(DEPLOYER)).rejects.toThrow('/get_account returned an error: account lookup failed')
  })

  test('transport failures are never defaulted to zero', async () => {
    const { client } = node(() => jsonResponse({}, 503))
    const err = await client.getSequence(DEPLOYER).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ChainQueryError)
    if (err instanceof ChainQueryError) {
      expect(err.code).toBe(503)
      expect(err.endpoint).toContain('/get_account')
    }
  })

  test('GETs are retried on transient failures', async () => {
    const { client, calls } = node(
      (_req, i) => (i === 0 ? jsonResponse({}, 503) : jsonResponse(envelope({ latest_block_height: 3 }))),
      2
    )
    expect(await client.getLatestHeight()).toBe(3)
    expect(calls).toHaveLength(2)
  })

  test('simulateCall quotes every argument and returns uppercase hex', async () => {
    const { client, calls } = node(() => jsonResponse(envelope({ return: '003e', gas_used: 21 })))
    const r = await client.simulateCall({ from: DEPLOYER, to: CONTRACT, data: '0xa5f3c23b' })
    expect(r).toEqual({ returnHex: '003E', gasUsed: 21 })
    const q = calls[0].url.searchParams
    expect(calls[0].url.pathname).toBe('/call')
    expect(q.get('fromAddress')).toBe(`"${DEPLOYER}"`)
    expect(q.get('toAddress')).toBe(`"${CONTRACT}"`)
    expect(q.get('data')).toBe('"A5F3C23B"')
  })
})

describe('NodeClient.broadcastTx', () => {
  test('posts a broadcast_tx request to the node root and maps the receipt', async () => {
    const { client, calls } = node(() =>
      jsonResponse(envelope({ receipt: { tx_hash: 'abc123', creates_contract: 1, contract_addr: CONTRACT.toLowerCase() } }))
    )
    const receipt = await client.broadcastTx(signedDeploy())

    expect(receipt).toEqual({ txHash: 'ABC123', contractAddress: CONTRACT, createsContract: true })
    expect(calls[0].method).toBe('POST')
    expect(calls[0].url.pathname).toBe('/')
    expect(calls[0].body).toBe(
      '{"id":"","jsonrpc":"2.0","method":"broadcast_tx","params":[[2,{"address":"","data":"6060","fee":0,"gas_limit":1000,' +
        `"input":{"address":"${DEPLOYER}","amount":1,"pub_key":[1,"AA"],"sequence":1,"signature":[1,"BB"]}}]]}`
    )
  })

  test('a call receipt has no contract address', async () => {
    const { client } = node(() =>
      jsonResponse(envelope({ receipt: { tx_hash: 'ff', creates_contract: 0, contract_addr: '' } }))
    )
    expect(await client.broadcastTx(signedDeploy())).toEqual({ txHash: 'FF', contractAddress: undefined, createsContract: false })
  })

  test('a receipt with only contract_addr is a contract creation', async () => {
    const { client } = node(() => jsonResponse(envelope({ receipt: { contract_addr: CONTRACT } })))
    expect(await client.broadcastTx(signedDeploy())).toEqual({
      txHash: undefined,
      contractAddress: CONTRACT,
      createsContract: true
    })
  })

  test('a receipt without the creation flag falls back to the empty recipient', async () => {
    const { client } = node(() => jsonResponse(envelope({ receipt: { tx_hash: '01' } })))
    expect(await client.broadcastTx(signedDeploy())).toEqual({ txHash: '01', contractAddress: undefined, createsContract: true })
  })

  test('node rejection carries the reason', async () => {
    const { client } = node(() => jsonResponse(errorEnvelope('Error invalid sequence. Got 1, expected 2')))
    const err = await client.broadcastTx(signedDeploy()).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(BroadcastError)
    if (err instanceof BroadcastError) expect(err.reason).toBe('Error invalid sequence. Got 1, expected 2')
  })

  test('JSON-RPC error objects are rejections too', async () => {
    const { client } = node(() => jsonResponse({ jsonrpc: '2.0', id: '', error: { code: -32603, message: 'mempool full' } }))
    const err = await client.broadcastTx(signedDeploy()).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(BroadcastError)
    if (err instanceof BroadcastError) {
      expect(err.reason).toBe('mempool full')
      expect(err.code).toBe(-32603)
    }
  })

  test('is not retried after a transport failure', async () => {
    const { client, calls } = node(() => jsonResponse({}, 503), 3)
    await expect(client.broadcastTx(signedDeploy())).rejects.toBeInstanceOf(BroadcastError)
    expect(calls).toHaveLength(1)
  })
})
