import { Command, type CommandContext } from "./Command.js";
import { toGameView, type GameView } from "../entities/GameState.js";
import { undo } from "../entities/RotationRules.js";
import type { GameId, TimePoint } from "../typedefs.js";

export class UndoLastAction extends Command<GameView> {
  readonly type = "UndoLastAction" as const;

  constructor(
    public readonly gameId: GameId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ store, config, logger }: CommandContext): Promise<GameView> {
    const { view, remaining } = await store.update(this.gameId, (state, id) => {
      undo(state, config.minQueueCapacity);
      return { view: toGameView(id, state), remaining: state.history.length };
    });

    logger?.info?.("Last action undone", {
      type: this.type,
      gameId: this.gameId,
      remaining,
      at: this.at,
    });

    return view;
  }
}
