import { promises as fs } from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import {
  FileContractRegistry,
  MemoryContractRegistry,
  formatRecordFile,
  parseRecordFile,
  type ContractRegistry
} from '../src/contracts/registry'
import { NotFoundError, RegistryError } from '../src/errors'
import { Abi } from '../src/types/abi'
import { CONTRACT, DEPLOYER } from './fakes'

const ABI = Abi.parse([
  {
    type: 'function',
    name: 'add',
    constant: true,
    inputs: [
      { name: 'a', type: 'int256' },
      { name: 'b', type: 'int256' }
    ],
    outputs: [{ name: 'sum', type: 'int256' }]
  }
])

const partial = { contractName: 'Adder', abi: ABI, deployerAddress: DEPLOYER, bytecode: '6080aabb' }

let dir: string

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'courier-registry-'))
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

const implementations: Array<[string, () => ContractRegistry]> = [
  ['MemoryContractRegistry', () => new MemoryContractRegistry()],
  ['FileContractRegistry', () => new FileContractRegistry(dir)]
]

describe.each(implementations)('%s', (_name, make) => {
  test('keeps a partial record until the address is filled in', async () => {
    const reg = make()
    await reg.put(partial)
    const before = await reg.get('Adder')
    expect(before.deployedAddress).toBeUndefined()
    expect(before.bytecode).toBe('6080AABB')

    const after = await reg.setDeployedAddress('Adder', CONTRACT.toLowerCase())
    expect(after.deployedAddress).toBe(CONTRACT)
    expect(await reg.get('Adder')).toEqual({ ...before, deployedAddress: CONTRACT })
  })

  test('setting the same address twice is a no-op', async () => {
    const reg = make()
    await reg.put(partial)
    await reg.setDeployedAddress('Adder', CONTRACT)
    await expect(reg.setDeployedAddress('Adder', CONTRACT)).resolves.toMatchObject({ deployedAddress: CONTRACT })
  })

  test('refuses to overwrite a recorded address', async () => {
    const reg = make()
    await reg.put({ ...partial, deployedAddress: CONTRACT })
    await expect(reg.setDeployedAddress('Adder', DEPLOYER)).rejects.toBeInstanceOf(RegistryError)
  })

  test('concurrent fills with different addresses: the first wins, the second fails', async () => {
    const reg = make()
    await reg.put(partial)
    const results = await Promise.allSettled([
      reg.setDeployedAddress('Adder', CONTRACT),
      reg.setDeployedAddress('Adder', DEPLOYER)
    ])
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected'])
    const second = results[1]
    if (second.status === 'rejected') expect(second.reason).toBeInstanceOf(RegistryError)
    expect((await reg.get('Adder')).deployedAddress).toBe(CONTRACT)
  })

  test('get throws NotFoundError for unknown names', async () => {
    const err = await make()
      .get('Missing')
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(NotFoundError)
    if (err instanceof NotFoundError) expect(err.key).toBe('Missing')
  })

  test('listAll returns records sorted by name', async () => {
    const reg = make()
    await reg.put({ ...partial, contractName: 'Zeta' })
    await reg.put(partial)
    expect((await reg.listAll()).map((r) => r.contractName)).toEqual(['Adder', 'Zeta'])
  })
})

describe('FileContractRegistry on disk', () => {
  test('writes KEY~VALUE lines and appends the contract address', async () => {
    const reg = new FileContractRegistry(dir)
    await reg.put(partial)
    await reg.setDeployedAddress('Adder', CONTRACT)
    await reg.setDeployedAddress('Adder', CONTRACT)

    const text = await fs.readFile(path.join(dir, 'Adder.abi'), 'utf8')
    expect(text).toBe(
      `ABI~${JSON.stringify(ABI)}\n` + `ADDRESS~${DEPLOYER}\n` + `BYTECODE~6080AABB\n` + `CONTRACT_ADDRESS~${CONTRACT}\n`
    )
  })

  test('readers never see a half-written file while a record is replaced', async () => {
    const reg = new FileContractRegistry(dir)
    await reg.put(partial)
    const reads = Array.from({ length: 20 }, () => reg.get('Adder'))
    const writes = Array.from({ length: 5 }, () => reg.put(partial))
    const afterWrites = writes.map(async (w) => {
      await w
      return reg.get('Adder')
    })
    const records = await Promise.all([...reads, ...afterWrites])
    for (const r of records) expect(r.deployerAddress).toBe(DEPLOYER)
    expect(await fs.readdir(dir)).toEqual(['Adder.abi'])
  })

  test('lists nothing when the directory does not exist yet', async () => {
    expect(await new FileContractRegistry(path.join(dir, 'nope')).listAll()).toEqual([])
  })

  test('rejects names that would escape the directory', async () => {
    await expect(new FileContractRegistry(dir).get('../etc')).rejects.toBeInstanceOf(RegistryError)
  })
})

describe('record file format', () => {
  test('reads files without a BYTECODE line', () => {
    const text = `ABI~${JSON.stringify(ABI)}\nADDRESS~${DEPLOYER}\nCONTRACT_ADDRESS~${CONTRACT}\n`
    expect(parseRecordFile(text, 'Adder')).toEqual({
      contractName: 'Adder',
      abi: ABI,
      deployerAddress: DEPLOYER,
      deployedAddress: CONTRACT
    })
  })

  test('round-trips a complete record', () => {
    const record = { ...partial, bytecode: '6080AABB', deployedAddress: CONTRACT }
    expect(parseRecordFile(formatRecordFile(record), 'Adder')).toEqual(record)
  })

  test('rejects conflicting contract addresses', () => {
    const text = `ABI~[]\nADDRESS~${DEPLOYER}\nCONTRACT_ADDRESS~${CONTRACT}\nCONTRACT_ADDRESS~${DEPLOYER}\n`
    expect(() => parseRecordFile(text, 'Adder')).toThrow(RegistryError)
  })

  test('rejects a missing ABI line', () => {
    expect(() => parseRecordFile(`ADDRESS~${DEPLOYER}\n`, 'Adder')).toThrow(RegistryError)
  })
})
