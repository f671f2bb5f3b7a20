import { Command, type CommandContext } from "./Command.js";
import { toGameView, type GameView, type Lineup } from "../entities/GameState.js";
import {
  applyGoal,
  parseTeam,
  type FullRotationEvent,
  type RotationSummary,
} from "../entities/RotationRules.js";
import type { GameId, Team, TimePoint } from "../typedefs.js";

export interface GoalResult {
  readonly view: GameView;
  readonly rotation: RotationSummary;
  readonly fullRotation: FullRotationEvent | undefined;
}

function hasEmptySlot({ red, blue }: Lineup): boolean {
  return [red.forward, red.goalkeeper, blue.forward, blue.goalkeeper].includes("");
}

export class ScoreGoal extends Command<GoalResult> {
  readonly type = "ScoreGoal" as const;
  readonly team: Team;

  constructor(
    public readonly gameId: GameId,
    team: unknown,
    public readonly at: TimePoint,
  ) {
    super();
    this.team = parseTeam(team);
  }

  async execute({ store, persistence, logger }: CommandContext): Promise<GoalResult> {
    const { view, outcome } = await store.update(this.gameId, (state, id) => {
      const goal = applyGoal(state, this.team);
      return { view: toGameView(id, state), outcome: goal };
    });

    logger?.info?.("Goal scored", {
      type: this.type,
      gameId: this.gameId,
      team: this.team,
      rotation: outcome.rotation,
      score: view.score,
      at: this.at,
    });

    if (outcome.fullRotation) {
      logger?.info?.("Full rotation", {
        gameId: this.gameId,
        ...outcome.fullRotation,
      });
    }

    if (hasEmptySlot(outcome.preRotation)) {
      logger?.warn?.("Goal not persisted; lineup has an empty slot", {
        gameId: this.gameId,
        lineup: outcome.preRotation,
      });
    } else {
      persistence.submit({
        type: "RecordGoal",
        gameId: this.gameId,
        team: this.team,
        preRotation: outcome.preRotation,
        rotation: outcome.rotation,
        fullRotation: outcome.fullRotation !== undefined,
      });
    }

    return { view, rotation: outcome.rotation, fullRotation: outcome.fullRotation };
  }
}
