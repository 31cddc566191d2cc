import type * as http from "node:http";
import type { ControlResponse, ControlStatus, TimerPayload } from "@countdown/core";
import { toTimerPayload } from "@countdown/core";
import {
  type CountdownError,
  isServerError,
  NotFoundError,
  PROBLEM_CONTENT_TYPE,
  serializeToRFC9457,
  ValidationError,
  wrapError,
} from "@countdown/errors";
import { persistSnapshot } from "../store/persist.js";
import type { SnapshotStore } from "../store/snapshot-store.js";
import { toPersistedSnapshot } from "../timer/snapshot.js";
import type { TimerMutation, TimerStateMachine } from "../timer/timer-state-machine.js";
import { AdjustParamsSchema, parseQuery, SetParamsSchema } from "./params.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ControlApiDeps {
  readonly timer: TimerStateMachine;
  readonly store: SnapshotStore;
}

export type ControlHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

type Method = "GET" | "POST";

interface Route {
  readonly method: Method;
  readonly handle: (query: URLSearchParams) => Promise<ControlResponse | TimerPayload>;
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

/**
 * Build the HTTP handler for the control endpoints.
 *
 * Mutations run synchronously against the timer; the resulting snapshot is
 * persisted before the response is written. A failed save is logged and the
 * call still succeeds, since the in-memory timer is authoritative.
 */
export function createControlHandler(deps: ControlApiDeps): ControlHandler {
  const { timer, store } = deps;

  async function mutate(status: ControlStatus, op: () => TimerMutation): Promise<ControlResponse> {
    const { snapshot, changed } = op();
    if (changed) {
      await persistSnapshot(store, toPersistedSnapshot(snapshot));
    }
    return { status, seconds: snapshot.seconds };
  }

  const routes: ReadonlyMap<string, Route> = new Map<string, Route>([
    ["/reset", { method: "POST", handle: () => mutate("reset", () => timer.reset()) }],
    ["/start", { method: "POST", handle: () => mutate("started", () => timer.start()) }],
    ["/pause", { method: "POST", handle: () => mutate("paused", () => timer.pause()) }],
    [
      "/adjust",
      {
        method: "POST",
        handle: (query) => {
          const { delta } = parseQuery(AdjustParamsSchema, query);
          return mutate("adjusted", () => timer.adjust(delta));
        },
      },
    ],
    [
      "/set",
      {
        method: "POST",
        handle: (query) => {
          const { seconds } = parseQuery(SetParamsSchema, query);
          return mutate("set", () => timer.set(seconds));
        },
      },
    ],
    ["/get", { method: "GET", handle: async () => toTimerPayload(timer.snapshot()) }],
  ]);

  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname;

    try {
      const route = routes.get(path);
      if (!route) {
        throw new NotFoundError({
          code: "ROUTE_NOT_FOUND",
          message: `No control endpoint at ${path}`,
        });
      }
      if (req.method !== route.method) {
        res.setHeader("Allow", route.method);
        throw new ValidationError({
          code: "METHOD_NOT_ALLOWED",
          message: `${req.method ?? "UNKNOWN"} is not allowed on ${path}`,
        });
      }

      const body = await route.handle(url.searchParams);
      sendJson(res, 200, body);
    } catch (error) {
      const wrapped = wrapError(error);
      if (isServerError(wrapped.httpStatus)) {
        console.error(`[countdown-control] ${req.method ?? "UNKNOWN"} ${path} failed:`, error);
      }
      sendProblem(res, wrapped, path);
    }
  };
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.setHeader("Content-Length", Buffer.byteLength(payload));
  res.end(payload);
}

function sendProblem(res: http.ServerResponse, error: CountdownError, instance: string): void {
  const payload = JSON.stringify(serializeToRFC9457(error, instance));
  res.statusCode = error.httpStatus;
  res.setHeader("Content-Type", PROBLEM_CONTENT_TYPE);
  res.setHeader("Content-Length", Buffer.byteLength(payload));
  res.end(payload);
}
