/**
 * @file deploy_and_call.node.ts
 * Deploy a small adder contract, then call it both ways.
 *
 * What it does:
 *  1) Checks the node serves the configured chain.
 *  2) Compiles and deploys `Adder`, waits for the next block and verifies the stored code.
 *  3) Calls add(25, 37) as a transaction and as a simulated call, printing both results.
 *
 * Env:
 *   COURIER_ADDRESS   (required: deployer account held by the key server)
 *   COURIER_*         (see src/config.ts for node/signer/compiler URLs and tx defaults)
 *
 * Run: npx tsx examples/deploy_and_call.node.ts
 */

import { Contract, createSession, assertChainId, deployContract, formatError, loadConfig } from '../src'

const ADDER_SOURCE = `
contract Adder {
  function add(int a, int b) constant returns (int sum) {
    sum = a + b;
  }
}
`

async function main(): Promise<void> {
  const from = process.env.COURIER_ADDRESS
  if (!from) throw new Error('Set COURIER_ADDRESS to the deployer account')

  const session = createSession(loadConfig())
  await assertChainId(session)

  const deployed = await deployContract(session, ADDER_SOURCE, { from })
  console.log(`Adder at ${deployed.record.deployedAddress} (verified: ${deployed.verification.ok})`)

  const adder = await Contract.load(session, 'Adder')
  const tx = await adder.transact('add', [25n, 37n])
  console.log(`add(25, 37) via transaction → ${String(tx.value)} (block ${tx.confirmation?.height ?? '?'})`)

  const simulated = await adder.simulate('add', [25n, 37n])
  console.log(`add(25, 37) via simulated call → ${String(simulated)}`)
}

main().catch((e: unknown) => {
  console.error(formatError(e))
  process.exitCode = 1
})
