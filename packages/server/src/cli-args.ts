import type { CountdownServerConfigInput } from "./config.js";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export interface CliArgs {
  readonly help: boolean;
  readonly overrides: CountdownServerConfigInput;
}

/**
 * Parse `process.argv`. Flags map onto config keys; numbers are left for
 * the config schema to reject.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  let help = false;
  let port: number | undefined;
  let hostname: string | undefined;
  let stateFile: string | undefined;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--port":
        if (next) {
          port = Number(next);
          i++;
        }
        break;
      case "--host":
        if (next) {
          hostname = next;
          i++;
        }
        break;
      case "--state-file":
        if (next) {
          stateFile = next;
          i++;
        }
        break;
      case "--help":
      case "-h":
        help = true;
        break;
    }
  }

  return {
    help,
    overrides: {
      ...(port !== undefined ? { port } : {}),
      ...(hostname ? { hostname } : {}),
      ...(stateFile ? { stateFile } : {}),
    },
  };
}

export const HELP_TEXT = `
countdown-server - Shared countdown timer over HTTP and WebSocket

Usage: countdown-server [options]

Options:
  --port <n>             Port to listen on (default: 8000, env COUNTDOWN_PORT)
  --host <addr>          Address to bind (default: 0.0.0.0, env COUNTDOWN_HOST)
  --state-file <path>    Snapshot file (default: timer_state.json, env COUNTDOWN_STATE_FILE)
  --help                 Show this help message
`;
