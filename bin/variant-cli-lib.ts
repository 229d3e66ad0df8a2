// bin/variant-cli-lib.ts
// Argument parsing and command execution for the variant command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { Outcome } from "../src/outcome/outcome";
import { isDone, isFail } from "../src/outcome/outcome";
import { done, invalidDefinition, usageError, validationFailed } from "../src/outcome/constructors";
import { sequence } from "../src/outcome/matchers";
import type { VariantConfig } from "../src/config/config";
import { silentLogger, type Logger } from "../src/logging/logger";
import { Machine, trace, type MachineDefinition } from "../src/variant/machine";
import { stepTableN } from "../src/variant/transition";
import { variant, type Tagged } from "../src/variant/types";
import { formatTrace } from "../src/variant/format";
import type { Classifier } from "../src/variant/classify";
import { VariantDefinitionError } from "../src/variant/errors";
import { intCategoryClassifier, type IntCategory } from "../src/catalog/intCategory";
import {
  TRI_STATE_CYCLE,
  TriStateSwitch,
  describeTriState,
  parseTriStateSwitch,
  toggle,
  triStateMachine,
} from "../src/catalog/triStateSwitch";
import {
  Player,
  describePlayer,
  parsePlayer,
  parsePlayerEvent,
  playerMachine,
} from "../src/catalog/player";
import {
  describeReachability,
  parseReachability,
  parseReachabilityEvent,
  reachabilityMachine,
} from "../src/catalog/reachability";
import { Barcode, describeBarcode } from "../src/catalog/barcode";
import { parseInteger } from "../src/catalog/text";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  configFile?: string;
  steps?: string;
  command?: string;
  args: string[];
};

export const COMMANDS = ["classify", "cycle", "player", "reach", "barcode"] as const;

export type CommandName = (typeof COMMANDS)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function isPositional(arg: string): boolean {
  return !arg.startsWith("-") || /^-\d/.test(arg);
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { args: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--config" || arg === "-c") {
      result.configFile = args[++i];
    } else if (arg === "--steps" || arg === "-n") {
      result.steps = args[++i] ?? "";
    } else if (isPositional(arg)) {
      if (result.command === undefined) {
        result.command = arg;
      } else {
        result.args.push(arg);
      }
    }
    // Ignore unknown flags
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
variant - Drive the built-in variant state machines

USAGE:
  variant classify <n>                        Classify an integer as Small, Medium, Big or Weird
  variant cycle [off|low|high] [--steps n]    Toggle the tri-state switch n times (default: 1)
  variant player [dead|alive:<n>] <events...> Apply increaseHeart / getAttacked events
  variant reach <status> [events...]          Apply linkUp:<conn> / linkDown / reset events
  variant barcode upc <a> <b> <c> <d>         Describe a UPC barcode
  variant barcode qr <text>                   Describe a QR code

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -c, --config <file>                Load configuration from a JSON or YAML file
  -n, --steps <n>                    Number of toggles for cycle
  --verbose                          Log every transition

STATUSES:
  unknown, notReachable, reachable:ethernetOrWiFi, reachable:wwan

EXAMPLES:
  variant classify 34645             # 34645 -> Medium
  variant cycle --steps 3            # Off -> Low -> High -> Off
  variant player increaseHeart increaseHeart getAttacked
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `variant-state v${pkg.version}`;
    }
    return "variant-state v0.1.0";
  } catch {
    return "variant-state v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

function isCommand(name: string): name is CommandName {
  return COMMANDS.some(command => command === name);
}

function classifyCommand(args: string[], config: VariantConfig): Outcome<string[]> {
  const [text] = args;
  if (text === undefined) {
    return usageError("classify needs a number", "n");
  }
  const input = Number(text);
  if (text.trim() === "" || Number.isNaN(input)) {
    return validationFailed(`Not a number: ${text}`, { n: text });
  }
  let classify: Classifier<IntCategory>;
  try {
    classify = intCategoryClassifier(config.classify);
  } catch (error) {
    if (error instanceof VariantDefinitionError) {
      return invalidDefinition(error.definition, error.diagnostics, { source: "cli" });
    }
    throw error;
  }
  return done([`${text} -> ${classify(input).tag}`]);
}

/** Longer cycles print only their first and last position. */
export const MAX_TRACED_STEPS = 64;

/**
 * Runs `events` through a logging machine and collects every position,
 * however many there are.
 */
function traceLogged<V extends Tagged, E>(
  definition: MachineDefinition<V, E>,
  from: V,
  events: readonly E[],
  logger: Logger
): V[] {
  const machine = new Machine(definition, { from, logger });
  const states: V[] = [from];
  const unsubscribe = machine.subscribe(record => {
    states.push(record.to);
  });
  machine.sendAll(events);
  unsubscribe();
  return states;
}

function cycleCommand(args: string[], steps: string | undefined, logger: Logger): Outcome<string[]> {
  const [startText] = args;
  const start: Outcome<TriStateSwitch> =
    startText === undefined ? done(TriStateSwitch.Off) : parseTriStateSwitch(startText);
  if (isFail(start)) return start;

  const count = steps === undefined ? 1 : parseInteger(steps);
  if (count === undefined || count < 0 || !Number.isSafeInteger(count)) {
    return validationFailed(`Invalid step count: ${steps}`, { steps });
  }
  logger.debug(`cycling ${count} times`);

  if (count <= MAX_TRACED_STEPS) {
    const states = trace(triStateMachine, Array.from({ length: count }, () => toggle), start.value);
    return done([formatTrace(states), describeTriState(states[states.length - 1])], { source: "cli", steps: count });
  }

  const last: TriStateSwitch = variant(
    stepTableN(TRI_STATE_CYCLE, start.value.tag, count % TRI_STATE_CYCLE.tags.length)
  );
  return done([`${start.value.tag} -> ... -> ${last.tag} (${count} toggles)`, describeTriState(last)], {
    source: "cli",
    steps: count,
  });
}

function playerCommand(args: string[], config: VariantConfig, logger: Logger): Outcome<string[]> {
  let from: Player = Player.Dead;
  let eventTexts = args;

  const first = args[0] === undefined ? undefined : parsePlayer(args[0], config.player);
  if (first !== undefined) {
    if (isDone(first)) {
      from = first.value;
      eventTexts = args.slice(1);
    } else if (first.failure.reason === "validation-failed") {
      return first;
    }
  }

  const events = sequence(eventTexts.map(parsePlayerEvent));
  if (isFail(events)) return events;

  const states = traceLogged(playerMachine(config.player), from, events.value, logger);
  return done([formatTrace(states), describePlayer(states[states.length - 1])], {
    source: "cli",
    steps: events.value.length,
  });
}

function reachCommand(args: string[], logger: Logger): Outcome<string[]> {
  const [statusText, ...eventTexts] = args;
  if (statusText === undefined) {
    return usageError("reach needs a status", "status");
  }
  const from = parseReachability(statusText);
  if (isFail(from)) return from;

  const events = sequence(eventTexts.map(parseReachabilityEvent));
  if (isFail(events)) return events;

  const states = traceLogged(reachabilityMachine, from.value, events.value, logger);
  return done([formatTrace(states), describeReachability(states[states.length - 1])], {
    source: "cli",
    steps: events.value.length,
  });
}

function barcodeCommand(args: string[]): Outcome<string[]> {
  const [kind, ...rest] = args;
  if (kind === "qr") {
    if (rest.length === 0) {
      return usageError("barcode qr needs text", "text");
    }
    return done([describeBarcode(Barcode.qrCode(rest.join(" ")))]);
  }
  if (kind === "upc") {
    const digits = rest.map(parseInteger);
    const [numberSystem, manufacturer, product, check] = digits;
    if (
      digits.length !== 4 ||
      numberSystem === undefined ||
      manufacturer === undefined ||
      product === undefined ||
      check === undefined
    ) {
      return validationFailed("barcode upc needs four integers", { digits: rest });
    }
    return done([describeBarcode(Barcode.upc(numberSystem, manufacturer, product, check))]);
  }
  return usageError("barcode needs upc or qr", "kind");
}

/**
 * Execute the parsed command. Returns the lines to print.
 */
export function runCommand(
  cli: CliArgs,
  config: VariantConfig,
  logger: Logger = silentLogger
): Outcome<string[]> {
  if (cli.command === undefined) {
    return usageError("No command given. Run variant --help for usage.", "command");
  }
  if (!isCommand(cli.command)) {
    return usageError(`Unknown command: ${cli.command}`);
  }

  switch (cli.command) {
    case "classify":
      return classifyCommand(cli.args, config);
    case "cycle":
      return cycleCommand(cli.args, cli.steps, logger);
    case "player":
      return playerCommand(cli.args, config, logger);
    case "reach":
      return reachCommand(cli.args, logger);
    case "barcode":
      return barcodeCommand(cli.args);
  }
}
