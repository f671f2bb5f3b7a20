import { Command, type CommandContext } from "./Command.js";
import { normalizePlayerId } from "./validation.js";
import type { PlayerId, TimePoint } from "../typedefs.js";

/** Adds a name to the player catalogue without touching any game. */
export class RegisterPlayer extends Command<PlayerId> {
  readonly type = "RegisterPlayer" as const;
  readonly name: PlayerId;

  constructor(name: unknown, public readonly at: TimePoint) {
    super();
    this.name = normalizePlayerId(name, "EmptyPlayerId", "name is required");
  }

  async execute({ persistence }: CommandContext): Promise<PlayerId> {
    persistence.submit({ type: "EnsurePlayers", names: [this.name] });
    return this.name;
  }
}
