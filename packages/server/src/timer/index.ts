export {
  freshTimerState,
  type PersistedSnapshot,
  PersistedSnapshotSchema,
  recoverTimerState,
  toPersistedSnapshot,
} from "./snapshot.js";
export { type TimerMutation, TimerStateMachine } from "./timer-state-machine.js";
