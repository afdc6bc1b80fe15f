import { describe, expect, test } from 'vitest'
import { EncodingError } from '../src/errors'
import { buildCallTx, attachSignature } from '../src/tx/build'
import { encodeSignedTx, makeSignBytes, signBytesHex, signBytesJson } from '../src/tx/encode'
import type { CallTx } from '../src/types/core'
import { hexToBytes } from '../src/utils/bytes'
import { encodeCanonicalJson } from '../src/utils/canonical'
import { DEPLOYER } from './fakes'

const EXPECTED_SIGN_JSON =
  '{"chain_id":"mychain","tx":[2,{"address":"","data":"6060","fee":0,"gas_limit":1000,' +
  `"input":{"address":"${DEPLOYER}","amount":1,"sequence":5}}]}`

function deployTx(): CallTx {
  return buildCallTx({
    account: { address: DEPLOYER, sequence: 4n },
    payload: hexToBytes('6060'),
    fee: 0n,
    gasLimit: 1000n,
    amount: 1n
  })
}

describe('encodeCanonicalJson', () => {
  test('sorts keys at every level and emits no whitespace', () => {
    const out = encodeCanonicalJson({ b: 1, a: [true, null, 'x'], c: { z: 1n, y: '"q"' } })
    expect(out).toBe('{"a":[true,null,"x"],"b":1,"c":{"y":"\\"q\\"","z":1}}')
  })

  test('renders bigint beyond the safe range as plain decimal', () => {
    expect(encodeCanonicalJson({ n: 2n ** 64n })).toBe('{"n":18446744073709551616}')
  })

  test('rejects fractions with the JSON path', () => {
    try {
      encodeCanonicalJson({ a: [1.5] })
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(EncodingError)
      if (e instanceof EncodingError) expect(e.path).toBe('$.a[0]')
    }
  })

  test('rejects undefined values', () => {
    expect(() => encodeCanonicalJson({ a: undefined })).toThrow(EncodingError)
  })
})

describe('sign bytes', () => {
  test('match the node format exactly', () => {
    expect(signBytesJson('mychain', deployTx())).toBe(EXPECTED_SIGN_JSON)
  })

  test('hex form is uppercase UTF-8 of the JSON, two characters per byte', () => {
    const hex = signBytesHex('mychain', deployTx())
    expect(hex).toBe(Buffer.from(EXPECTED_SIGN_JSON, 'utf8').toString('hex').toUpperCase())
    expect(hex.startsWith('7B22636861696E5F6964')).toBe(true)
    expect(hex.length).toBe(makeSignBytes('mychain', deployTx()).length * 2)
  })

  test('do not depend on field insertion order', () => {
    const a = deployTx()
    const b: CallTx = {
      sequence: a.sequence,
      payload: a.payload,
      gasLimit: a.gasLimit,
      fee: a.fee,
      amount: a.amount,
      recipient: a.recipient,
      sender: a.sender,
      kind: 'call'
    }
    expect(signBytesHex('mychain', b)).toBe(signBytesHex('mychain', a))
  })

  test('bind the chain identifier', () => {
    expect(signBytesHex('otherchain', deployTx())).not.toBe(signBytesHex('mychain', deployTx()))
  })

  test('fail with EncodingError when a field is missing', () => {
    const broken = { ...deployTx() }
    Reflect.deleteProperty(broken, 'fee')
    expect(() => makeSignBytes('mychain', broken)).toThrow(EncodingError)
  })
})

describe('encodeSignedTx', () => {
  test('adds tagged signature and public key under input', () => {
    const signed = attachSignature(deployTx(), { publicKey: 'aa11', signature: '0xbb22' })
    expect(encodeCanonicalJson(encodeSignedTx(signed))).toBe(
      '[2,{"address":"","data":"6060","fee":0,"gas_limit":1000,' +
        `"input":{"address":"${DEPLOYER}","amount":1,"pub_key":[1,"AA11"],"sequence":5,"signature":[1,"BB22"]}}]`
    )
  })
})
