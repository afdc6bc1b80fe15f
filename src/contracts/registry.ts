/**
 * Contract registry: what is needed to call a contract after it was deployed.
 *
 * A record is written in two steps. `put` stores the ABI, deployer and
 * submitted bytecode as soon as the create transaction is accepted;
 * `setDeployedAddress` fills in the contract address afterwards. The address
 * is append-only: setting the same value again is a no-op, a different one is
 * a RegistryError.
 *
 * FileContractRegistry keeps one `<name>.abi` file per contract:
 *
 *   ABI~[{"name":"add",…}]
 *   ADDRESS~<deployer>
 *   BYTECODE~<HEX>
 *   CONTRACT_ADDRESS~<address>      (appended once known)
 */

import { promises as fs } from 'node:fs'
import * as path from 'node:path'
import { isAddress, normalizeAddress } from '../address'
import { NotFoundError, RegistryError, ensureError } from '../errors'
import { Abi } from '../types/abi'
import type { ContractRecord } from '../types/core'
import { KeyedLock } from '../utils/lock'
import { formatZodError } from '../utils/schema'

export interface ContractRegistry {
  /** Store (or replace) a record. `deployedAddress` may be left for later. */
  put(record: ContractRecord): Promise<void>
  /** Throws NotFoundError when `name` is unknown. */
  get(name: string): Promise<ContractRecord>
  listAll(): Promise<ContractRecord[]>
  setDeployedAddress(name: string, address: string): Promise<ContractRecord>
}

const NAME_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/

function assertName(name: string): void {
  if (!NAME_RE.test(name)) throw new RegistryError(`Invalid contract name: ${JSON.stringify(name)}`)
}

function normalizeRecord(r: ContractRecord): ContractRecord {
  assertName(r.contractName)
  const out: ContractRecord = {
    contractName: r.contractName,
    abi: r.abi,
    deployerAddress: normalizeAddress(r.deployerAddress, 'deployerAddress')
  }
  if (r.deployedAddress) out.deployedAddress = normalizeAddress(r.deployedAddress, 'deployedAddress')
  if (r.bytecode) out.bytecode = r.bytecode.replace(/^0x/i, '').toUpperCase()
  return out
}

/** Shared fill rule for the deployed address. */
function fillAddress(record: ContractRecord, address: string): { record: ContractRecord; changed: boolean } {
  const addr = normalizeAddress(address, 'deployedAddress')
  if (record.deployedAddress === undefined) return { record: { ...record, deployedAddress: addr }, changed: true }
  if (record.deployedAddress === addr) return { record, changed: false }
  throw new RegistryError(
    `Contract "${record.contractName}" already has address ${record.deployedAddress}; refusing to overwrite with ${addr}`,
    { context: { contract: record.contractName, existing: record.deployedAddress, requested: addr } }
  )
}

// ──────────────────────────────────────────────────────────────────────────────
// Record file format
// ──────────────────────────────────────────────────────────────────────────────

const KEY_ABI = 'ABI'
const KEY_DEPLOYER = 'ADDRESS'
const KEY_BYTECODE = 'BYTECODE'
const KEY_CONTRACT = 'CONTRACT_ADDRESS'

export function formatRecordLine(key: string, value: string): string {
  return `${key}~${value}\n`
}

export function formatRecordFile(record: ContractRecord): string {
  const r = normalizeRecord(record)
  let out = formatRecordLine(KEY_ABI, JSON.stringify(r.abi)) + formatRecordLine(KEY_DEPLOYER, r.deployerAddress)
  if (r.bytecode) out += formatRecordLine(KEY_BYTECODE, r.bytecode)
  if (r.deployedAddress) out += formatRecordLine(KEY_CONTRACT, r.deployedAddress)
  return out
}

/** Parse a record file. Unknown keys are ignored; repeated keys must agree. */
export function parseRecordFile(text: string, contractName: string): ContractRecord {
  const fields = new Map<string, string>()
  for (const [i, line] of text.split(/\r?\n/).entries()) {
    if (line.trim() === '') continue
    const sep = line.indexOf('~')
    if (sep <= 0) throw new RegistryError(`${contractName}: line ${i + 1} is not KEY~VALUE`)
    const key = line.slice(0, sep).trim()
    const value = line.slice(sep + 1).trim()
    const prev = fields.get(key)
    if (prev !== undefined && prev !== value) {
      throw new RegistryError(`${contractName}: conflicting values for ${key}`, { context: { first: prev, second: value } })
    }
    fields.set(key, value)
  }

  const abiText = fields.get(KEY_ABI)
  const deployer = fields.get(KEY_DEPLOYER)
  if (abiText === undefined) throw new RegistryError(`${contractName}: missing ${KEY_ABI}`)
  if (deployer === undefined || !isAddress(deployer)) throw new RegistryError(`${contractName}: missing or invalid ${KEY_DEPLOYER}`)

  let abiJson: unknown
  try {
    abiJson = JSON.parse(abiText)
  } catch (e) {
    throw new RegistryError(`${contractName}: ${KEY_ABI} is not JSON`, { cause: e })
  }
  const abi = Abi.safeParse(abiJson)
  if (!abi.success) throw new RegistryError(`${contractName}: invalid ABI: ${formatZodError(abi.error)}`)

  const record: ContractRecord = {
    contractName,
    abi: abi.data,
    deployerAddress: normalizeAddress(deployer)
  }
  const bytecode = fields.get(KEY_BYTECODE)
  if (bytecode) record.bytecode = bytecode.toUpperCase()
  const deployed = fields.get(KEY_CONTRACT)
  if (deployed) {
    if (!isAddress(deployed)) throw new RegistryError(`${contractName}: invalid ${KEY_CONTRACT}`)
    record.deployedAddress = normalizeAddress(deployed)
  }
  return record
}

// ──────────────────────────────────────────────────────────────────────────────
// Implementations
// ──────────────────────────────────────────────────────────────────────────────

export class MemoryContractRegistry implements ContractRegistry {
  private readonly records = new Map<string, ContractRecord>()
  private readonly locks = new KeyedLock()

  async put(record: ContractRecord): Promise<void> {
    const r = normalizeRecord(record)
    await this.locks.run(r.contractName, async () => {
      this.records.set(r.contractName, r)
    })
  }

  async get(name: string): Promise<ContractRecord> {
    const r = this.records.get(name)
    if (!r) throw new NotFoundError(name)
    return { ...r }
  }

  async listAll(): Promise<ContractRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => a.contractName.localeCompare(b.contractName))
      .map((r) => ({ ...r }))
  }

  async setDeployedAddress(name: string, address: string): Promise<ContractRecord> {
    return this.locks.run(name, async () => {
      const current = await this.get(name)
      const { record } = fillAddress(current, address)
      this.records.set(name, record)
      return { ...record }
    })
  }
}

export class FileContractRegistry implements ContractRegistry {
  readonly dir: string
  private readonly locks = new KeyedLock()

  constructor(dir: string) {
    this.dir = path.resolve(dir)
  }

  fileFor(name: string): string {
    assertName(name)
    return path.join(this.dir, `${name}.abi`)
  }

  /** Written to `<file>.tmp` and renamed, so readers never see a partial file. */
  async put(record: ContractRecord): Promise<void> {
    const text = formatRecordFile(record)
    const file = this.fileFor(record.contractName)
    const tmp = `${file}.tmp`
    await this.locks.run(record.contractName, async () => {
      await this.io(`write ${file}`, async () => {
        await fs.mkdir(this.dir, { recursive: true })
        await fs.writeFile(tmp, text, 'utf8')
        await fs.rename(tmp, file)
      })
    })
  }

  async get(name: string): Promise<ContractRecord> {
    const file = this.fileFor(name)
    let text: string
    try {
      text = await fs.readFile(file, 'utf8')
    } catch (e) {
      if (isNotFound(e)) throw new NotFoundError(name, { context: { file } })
      throw new RegistryError(`Cannot read ${file}: ${ensureError(e).message}`, { cause: e })
    }
    return parseRecordFile(text, name)
  }

  async listAll(): Promise<ContractRecord[]> {
    let entries: string[]
    try {
      entries = await fs.readdir(this.dir)
    } catch (e) {
      if (isNotFound(e)) return []
      throw new RegistryError(`Cannot list ${this.dir}: ${ensureError(e).message}`, { cause: e })
    }
    const names = entries
      .filter((f) => f.endsWith('.abi'))
      .map((f) => f.slice(0, -'.abi'.length))
      .filter((n) => NAME_RE.test(n))
      .sort()
    const out: ContractRecord[] = []
    for (const n of names) out.push(await this.get(n))
    return out
  }

  /** Appends a CONTRACT_ADDRESS line; the rest of the file is left untouched. */
  async setDeployedAddress(name: string, address: string): Promise<ContractRecord> {
    const file = this.fileFor(name)
    return this.locks.run(name, async () => {
      const current = await this.get(name)
      const { record, changed } = fillAddress(current, address)
      if (changed && record.deployedAddress) {
        const line = formatRecordLine(KEY_CONTRACT, record.deployedAddress)
        await this.io(`append ${file}`, () => fs.appendFile(file, line, 'utf8'))
      }
      return record
    })
  }

  private async io(what: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn()
    } catch (e) {
      throw new RegistryError(`Registry ${what} failed: ${ensureError(e).message}`, { cause: e })
    }
  }
}

function isNotFound(e: unknown): boolean {
  return !!e && typeof e === 'object' && 'code' in e && e.code === 'ENOENT'
}
