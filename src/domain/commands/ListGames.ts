import { Command, type CommandContext } from "./Command.js";
import type { GameSummary } from "../entities/GameState.js";
import type { TimePoint } from "../typedefs.js";

export class ListGames extends Command<GameSummary[]> {
  readonly type = "ListGames" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ store }: CommandContext): Promise<GameSummary[]> {
    return store.list();
  }
}
