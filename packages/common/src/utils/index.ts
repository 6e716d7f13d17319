/**
 * Utility functions for the Hostbeat system.
 *
 * @module @hostbeat/common/utils
 */

export { envBool, envNum, envStr } from "./env";
