import { Command, type CommandContext } from "./Command.js";
import { normalizePlayerId } from "./validation.js";
import { toGameView, type GameView } from "../entities/GameState.js";
import { removePlayer } from "../entities/RotationRules.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";

export class RemovePlayer extends Command<GameView> {
  readonly type = "RemovePlayer" as const;
  readonly playerId: PlayerId;

  constructor(
    public readonly gameId: GameId,
    playerId: unknown,
    public readonly at: TimePoint,
  ) {
    super();
    this.playerId = normalizePlayerId(playerId, "EmptyPlayerId", "player_id is required");
  }

  async execute({ store, logger }: CommandContext): Promise<GameView> {
    const { view, removedFrom } = await store.update(this.gameId, (state, id) => {
      const removedFrom = removePlayer(state, this.playerId);
      return { view: toGameView(id, state), removedFrom };
    });

    logger?.info?.("Player removed", {
      type: this.type,
      gameId: this.gameId,
      playerId: this.playerId,
      removedFrom,
      at: this.at,
    });

    return view;
  }
}
