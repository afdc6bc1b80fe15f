/* Test setup for contract-courier (Vitest)
 * - Keeps the logger quiet unless COURIER_LOG_LEVEL asks otherwise, so
 *   expected failures do not flood the output.
 */

import { isLogLevel, setGlobalLogLevel } from '../src/utils/logger'

const requested = process.env.COURIER_LOG_LEVEL
setGlobalLogLevel(isLogLevel(requested) ? requested : 'silent')

export {}
