/**
 * Contracts module public exports: call codec, verifier, registry,
 * deployment and the deployed-contract client.
 */

export * from './calldata'
export * from './client'
export * from './deployer'
export * from './registry'
export * from './verify'
