import { Command, type CommandContext } from "./Command.js";
import { toGameView, type GameView } from "../entities/GameState.js";
import { startGame } from "../entities/RotationRules.js";
import type { GameId, TimePoint } from "../typedefs.js";

export class StartGame extends Command<GameView> {
  readonly type = "StartGame" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ store, logger }: CommandContext): Promise<GameView> {
    const view = await store.update(this.gameId, (state, id) => {
      startGame(state);
      return toGameView(id, state);
    });

    logger?.info?.("Game started", { type: this.type, gameId: this.gameId, at: this.at });
    return view;
  }
}
