import { Command, type CommandContext } from "./Command.js";
import { toGameView, type GameView } from "../entities/GameState.js";
import type { GameId, TimePoint } from "../typedefs.js";

export class GetGame extends Command<GameView> {
  readonly type = "GetGame" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ store }: CommandContext): Promise<GameView> {
    return store.read(this.gameId, (state, id) => toGameView(id, state));
  }
}
