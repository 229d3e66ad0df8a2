import type { Outcome } from "../outcome/outcome";
import { isFail } from "../outcome/outcome";
import { done, invalidTransition, validationFailed } from "../outcome/constructors";
import { defineMachine, type MachineDefinition } from "../variant/machine";
import { match } from "../variant/match";
import { defineRawValues } from "../variant/rawValues";
import { variant, type Unit, type WithPayload } from "../variant/types";
import { parseInteger, splitArgument } from "./text";

/**
 * Life total of a player. `Alive` always carries at least one heart; losing
 * the last one makes the player `Dead`.
 */
export type Player = Unit<"Dead"> | WithPayload<"Alive", number>;

export type PlayerEvent = Unit<"IncreaseHeart"> | Unit<"GetAttacked">;

export const Player = {
  Dead: variant("Dead"),
  alive(hearts: number): WithPayload<"Alive", number> {
    if (!Number.isInteger(hearts) || hearts < 1) {
      throw new RangeError(`Alive needs a positive whole number of hearts, got ${hearts}`);
    }
    return variant("Alive", hearts);
  },
} as const;

export const increaseHeart: PlayerEvent = variant("IncreaseHeart");
export const getAttacked: PlayerEvent = variant("GetAttacked");

export type PlayerRules = {
  maxHearts: number;
};

export const DEFAULT_PLAYER_RULES: PlayerRules = {
  maxHearts: 10,
};

export function playerTransition(
  current: Player,
  event: PlayerEvent,
  rules: PlayerRules = DEFAULT_PLAYER_RULES
): Player {
  switch (event.tag) {
    case "IncreaseHeart":
      if (current.tag === "Dead") {
        return Player.alive(1);
      }
      if (current.payload >= rules.maxHearts) {
        return current;
      }
      return Player.alive(current.payload + 1);
    case "GetAttacked":
      if (current.tag === "Dead" || current.payload <= 1) {
        return Player.Dead;
      }
      return Player.alive(current.payload - 1);
  }
}

export function playerMachine(rules: PlayerRules = DEFAULT_PLAYER_RULES): MachineDefinition<Player, PlayerEvent> {
  return defineMachine<Player, PlayerEvent>({
    name: "Player",
    initial: Player.Dead,
    transition: (current, event) => playerTransition(current, event, rules),
  });
}

export function describePlayer(player: Player): string {
  return match(player, {
    Dead: () => "dead",
    Alive: (alive) => `alive with ${alive.payload} ${alive.payload === 1 ? "heart" : "hearts"}`,
  });
}

export function isAlive(player: Player): boolean {
  return player.tag === "Alive";
}

export function heartsOf(player: Player): number {
  return match(player, {
    Dead: () => 0,
    Alive: (alive) => alive.payload,
  });
}

export const PLAYER_EVENT_RAW_VALUES = defineRawValues("PlayerEvent", {
  IncreaseHeart: "increaseHeart",
  GetAttacked: "getAttacked",
});

/**
 * `dead` or `alive:<hearts>`, with hearts between 1 and `rules.maxHearts`.
 */
export function parsePlayer(text: string, rules: PlayerRules = DEFAULT_PLAYER_RULES): Outcome<Player> {
  const [head, arg] = splitArgument(text);
  if (head === "dead" && arg === undefined) {
    return done(Player.Dead);
  }
  if (head !== "alive" || arg === undefined) {
    return invalidTransition("Player", text);
  }
  const hearts = parseInteger(arg);
  if (hearts === undefined || hearts < 1) {
    return validationFailed(`Invalid heart count: ${arg}`, { hearts: arg });
  }
  if (hearts > rules.maxHearts) {
    return validationFailed(`Heart count ${hearts} is above the limit of ${rules.maxHearts}`, {
      hearts: arg,
      maxHearts: rules.maxHearts,
    });
  }
  return done(Player.alive(hearts));
}

export function parsePlayerEvent(text: string): Outcome<PlayerEvent> {
  const tag = PLAYER_EVENT_RAW_VALUES.fromRaw(text);
  if (isFail(tag)) {
    return invalidTransition("PlayerEvent", text, "event");
  }
  return done<PlayerEvent>(variant(tag.value));
}
