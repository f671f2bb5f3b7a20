import { Command, type CommandContext } from "./Command.js";
import { normalizePlayerId } from "./validation.js";
import { toGameView, type GameView } from "../entities/GameState.js";
import { enqueuePlayer } from "../entities/RotationRules.js";
import type { GameId, PlayerId, TimePoint } from "../typedefs.js";

export class EnqueuePlayer extends Command<GameView> {
  readonly type = "EnqueuePlayer" as const;
  readonly playerId: PlayerId;

  constructor(
    public readonly gameId: GameId,
    playerId: unknown,
    public readonly at: TimePoint,
  ) {
    super();
    this.playerId = normalizePlayerId(playerId, "EmptyPlayerId", "player_id is required");
  }

  async execute({ store, persistence, logger }: CommandContext): Promise<GameView> {
    const view = await store.update(this.gameId, (state, id) => {
      enqueuePlayer(state, this.playerId);
      return toGameView(id, state);
    });

    logger?.info?.("Player queued", {
      type: this.type,
      gameId: this.gameId,
      playerId: this.playerId,
      waiting: view.waiting.length,
      at: this.at,
    });

    persistence.submit({ type: "EnsurePlayers", names: [this.playerId] });
    return view;
  }
}
