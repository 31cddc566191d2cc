export {
  DEFAULT_ERROR_BACKOFF_MS,
  DEFAULT_TICK_INTERVAL_MS,
  TickScheduler,
  type TickSchedulerConfig,
  type TickSchedulerDeps,
} from "./tick-scheduler.js";
