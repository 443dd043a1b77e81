import { parseArgs } from "node:util";
import { isHandError, showdown } from "./engine/Showdown.js";

export const USAGE = `usage: showdown [-h] HAND_A HAND_B

Determine the winning poker hand.

positional arguments:
  HAND_A      the first player's hand  (e.g. "AsKsQsJsTs", "AAAA3", "tjqk*")
  HAND_B      the second player's hand

options:
  -h, --help  show this help message and exit`;

export interface CliIO {
  log: (line: string) => void;
  error: (line: string) => void;
}

/** 終了コードを返す（0: 正常, 1: 手札が不正, 2: 引数が不正） */
export function runCli(argv: string[], io: CliIO = console): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    io.error(`${USAGE}\n\nshowdown: error: ${e instanceof Error ? e.message : String(e)}`);
    return 2;
  }

  if (parsed.values.help) {
    io.log(USAGE);
    return 0;
  }

  const [handA, handB] = parsed.positionals;
  if (handA === undefined || handB === undefined || parsed.positionals.length > 2) {
    io.error(`${USAGE}\n\nshowdown: error: expected exactly two hands`);
    return 2;
  }

  try {
    const r = showdown(handA, handB);
    const result =
      r.outcome === "FirstWins" ? handA :
      r.outcome === "SecondWins" ? handB : "tie";
    io.log(`${r.first.handType}, ${r.second.handType}, ${result}`);
    return 0;
  } catch (e) {
    if (!isHandError(e)) throw e;
    io.error(`showdown: ${e.code}: ${e.message}`);
    return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: { help: { type: "boolean", short: "h" } },
    allowPositionals: true,
    strict: true,
  });
}
