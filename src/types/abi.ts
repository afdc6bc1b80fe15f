/**
 * Contract interface descriptions as emitted by the compile service
 * (Solidity-style JSON ABI), with a zod schema for validating untrusted input.
 *
 * Only the fields the call encoder reads are modelled; unknown keys are dropped.
 */

import { z } from 'zod'

export const AbiParam = z.object({
  name: z.string().default(''),
  type: z.string().min(1)
})
export type AbiParam = z.output<typeof AbiParam>

export const StateMutability = z.enum(['pure', 'view', 'nonpayable', 'payable'])
export type StateMutability = z.output<typeof StateMutability>

export const AbiEntry = z.object({
  type: z.enum(['function', 'constructor', 'event', 'fallback', 'receive', 'error']).default('function'),
  name: z.string().optional(),
  inputs: z.array(AbiParam).default([]),
  outputs: z.array(AbiParam).default([]),
  constant: z.boolean().optional(),
  payable: z.boolean().optional(),
  stateMutability: StateMutability.optional(),
  anonymous: z.boolean().optional()
})
export type AbiEntry = z.output<typeof AbiEntry>

export const Abi = z.array(AbiEntry)
export type Abi = z.output<typeof Abi>

export type AbiFunction = AbiEntry & { type: 'function'; name: string }

export function isAbiFunction(e: AbiEntry): e is AbiFunction {
  return e.type === 'function' && typeof e.name === 'string' && e.name.length > 0
}

/** Functions that do not change state: their result can be read without a transaction. */
export function isReadOnly(fn: AbiEntry): boolean {
  return fn.constant === true || fn.stateMutability === 'view' || fn.stateMutability === 'pure'
}

export function functionsNamed(abi: Abi, name: string): AbiFunction[] {
  return abi.filter(isAbiFunction).filter((f) => f.name === name)
}
