/**
 * @countdown/core
 *
 * Shared clock abstraction and timer types.
 */

export const PACKAGE_NAME = "@countdown/core" as const;

export { type Clock, defaultClock } from "./clock-types.js";
export {
  type ControlResponse,
  type ControlStatus,
  type TimerPayload,
  type TimerSnapshot,
  toTimerPayload,
} from "./timer-types.js";
