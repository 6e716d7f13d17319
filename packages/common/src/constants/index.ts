/**
 * Constants for the Hostbeat system.
 *
 * @module @hostbeat/common/constants
 */

export { HeartbeatIntervals } from "./intervals";
