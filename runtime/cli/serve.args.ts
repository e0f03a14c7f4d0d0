export interface ServeArgs {
  host?: string;
  port?: number;
  idleTimeoutSeconds?: number;
  reaperIntervalSeconds?: number;
  model?: string;
  help: boolean;
}

export const SERVE_USAGE = [
  "Usage: serve [--host <host>] [--port <port>] [--model <model>]",
  "             [--idle-timeout <seconds>] [--reaper-interval <seconds>]",
].join("\n");

function readNumber(raw: string | undefined, flag: string): number {
  const parsed = Number(raw);
  if (typeof raw !== "string" || raw.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`Invalid value for ${flag}: expected a number`);
  }
  return parsed;
}

function readString(raw: string | undefined, flag: string): string {
  if (typeof raw !== "string" || raw.trim() === "" || raw.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return raw.trim();
}

export function parseServeArgs(argv: readonly string[]): ServeArgs {
  const args: ServeArgs = { help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--") {
      continue;
    }
    if (token === "--help" || token === "-h") {
      args.help = true;
      continue;
    }
    if (token === "--host") {
      args.host = readString(argv[i + 1], token);
      i += 1;
      continue;
    }
    if (token === "--port") {
      args.port = readNumber(argv[i + 1], token);
      i += 1;
      continue;
    }
    if (token === "--model") {
      args.model = readString(argv[i + 1], token);
      i += 1;
      continue;
    }
    if (token === "--idle-timeout") {
      args.idleTimeoutSeconds = readNumber(argv[i + 1], token);
      i += 1;
      continue;
    }
    if (token === "--reaper-interval") {
      args.reaperIntervalSeconds = readNumber(argv[i + 1], token);
      i += 1;
      continue;
    }
    throw new Error(`Unknown argument "${String(token)}"\n${SERVE_USAGE}`);
  }

  return args;
}
