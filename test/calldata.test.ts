import { describe, expect, test } from 'vitest'
import {
  decodeInteger,
  decodeReturn,
  encodeCall,
  functionSelector,
  functionSignature
} from '../src/contracts/calldata'
import { ArgumentArityError, ArgumentTypeError, DecodeError, UnknownFunctionError } from '../src/errors'
import { Abi } from '../src/types/abi'
import { bytesToHex } from '../src/utils/bytes'
import { CONTRACT, word } from './fakes'

const ADDER = Abi.parse([
  {
    type: 'function',
    name: 'add',
    constant: true,
    inputs: [
      { name: 'a', type: 'int' },
      { name: 'b', type: 'int' }
    ],
    outputs: [{ name: 'sum', type: 'int' }]
  },
  {
    type: 'function',
    name: 'setLabel',
    inputs: [{ name: 'label', type: 'string' }],
    outputs: []
  },
  {
    type: 'function',
    name: 'owner',
    constant: true,
    inputs: [],
    outputs: [
      { name: 'who', type: 'address' },
      { name: 'active', type: 'bool' }
    ]
  }
])

describe('selectors', () => {
  test('canonicalise int to int256', () => {
    expect(functionSignature({ name: 'add', inputs: ADDER[0].inputs })).toBe('add(int256,int256)')
    expect(bytesToHex(functionSelector({ name: 'add', inputs: ADDER[0].inputs }))).toBe('a5f3c23b')
  })

  test('match the well-known transfer selector', () => {
    const inputs = [
      { name: 'to', type: 'address' },
      { name: 'value', type: 'uint256' }
    ]
    expect(bytesToHex(functionSelector({ name: 'transfer', inputs }))).toBe('a9059cbb')
  })
})

describe('encodeCall', () => {
  test('add(25, 37) is the selector followed by two words', () => {
    expect(bytesToHex(encodeCall(ADDER, 'add', [0x19n, 0x25n]))).toBe(`a5f3c23b${word(0x19n)}${word(0x25n)}`)
  })

  test('accepts numbers and decimal strings', () => {
    expect(bytesToHex(encodeCall(ADDER, 'add', [17, '20']))).toBe(`a5f3c23b${word(0x11n)}${word(0x14n)}`)
  })

  test('encodes negative integers as two’s complement', () => {
    expect(bytesToHex(encodeCall(ADDER, 'add', [-1n, 0n])).slice(8, 72)).toBe('f'.repeat(64))
  })

  test('puts dynamic strings in the tail', () => {
    const data = bytesToHex(encodeCall(ADDER, 'setLabel', ['hi']))
    expect(data.slice(8)).toBe(`${word(0x20n)}${word(2n)}6869${'0'.repeat(60)}`)
  })

  test('rejects unknown functions', () => {
    expect(() => encodeCall(ADDER, 'sub', [1n, 2n])).toThrow(UnknownFunctionError)
  })

  test('rejects the wrong number of arguments', () => {
    try {
      encodeCall(ADDER, 'add', [1n])
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ArgumentArityError)
      if (e instanceof ArgumentArityError) {
        expect(e.expected).toBe(2)
        expect(e.actual).toBe(1)
      }
    }
  })

  test('rejects values that do not fit the declared type', () => {
    try {
      encodeCall(ADDER, 'add', ['abc', 1n])
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ArgumentTypeError)
      if (e instanceof ArgumentTypeError) {
        expect(e.argIndex).toBe(0)
        expect(e.declaredType).toBe('int')
      }
    }
    expect(() => encodeCall(ADDER, 'add', [true, 1n])).toThrow(ArgumentTypeError)
  })

  test('rejects unsupported types', () => {
    const abi = Abi.parse([{ type: 'function', name: 'f', inputs: [{ name: 'xs', type: 'uint256[]' }] }])
    expect(() => encodeCall(abi, 'f', [1n])).toThrow(ArgumentTypeError)
  })
})

describe('decodeInteger', () => {
  test('reads a padded big-endian word', () => {
    expect(decodeInteger(word(0x25n))).toBe(37n)
  })

  test('treats empty and all-zero input as zero', () => {
    expect(decodeInteger('')).toBe(0n)
    expect(decodeInteger('0'.repeat(64))).toBe(0n)
  })

  test('rejects non-hex input', () => {
    expect(() => decodeInteger('zz')).toThrow(DecodeError)
  })
})

describe('decodeReturn', () => {
  test('decodes a single int output', () => {
    expect(decodeReturn(ADDER, 'add', word(62n).toUpperCase())).toBe(62n)
  })

  test('reads int outputs as signed', () => {
    expect(decodeReturn(ADDER, 'add', 'f'.repeat(64))).toBe(-1n)
  })

  test('decodes several outputs into an array', () => {
    const hex = `${'0'.repeat(24)}${CONTRACT.toLowerCase()}${word(1n)}`
    expect(decodeReturn(ADDER, 'owner', hex)).toEqual([CONTRACT, true])
  })

  test('returns undefined for functions without outputs', () => {
    expect(decodeReturn(ADDER, 'setLabel', '')).toBeUndefined()
  })

  test('rejects short return data', () => {
    expect(() => decodeReturn(ADDER, 'add', '0025')).toThrow(DecodeError)
  })
})
