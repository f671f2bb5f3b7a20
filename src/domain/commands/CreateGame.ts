import { Command, type CommandContext } from "./Command.js";
import { normalizePlayerId } from "./validation.js";
import type { TeamSlot } from "../entities/GameState.js";
import { findDuplicate } from "../entities/RotationRules.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { CreatedGame } from "../ports/GameStore.js";
import type { PlayerId, TimePoint } from "../typedefs.js";

export interface CreateGameInput {
  readonly red: { readonly forward?: unknown; readonly goalkeeper?: unknown };
  readonly blue: { readonly forward?: unknown; readonly goalkeeper?: unknown };
  readonly waiting?: readonly unknown[];
  readonly started?: boolean;
}

const EMPTY_SLOT = "empty player_id in active slots";
const EMPTY_WAITING = "empty player_id in waiting queue";

export class CreateGame extends Command<CreatedGame> {
  readonly type = "CreateGame" as const;
  readonly red: TeamSlot;
  readonly blue: TeamSlot;
  readonly waiting: readonly PlayerId[];
  readonly started: boolean;

  constructor(
    input: CreateGameInput,
    public readonly at: TimePoint,
  ) {
    super();

    this.red = CreateGame.toSlot(input.red);
    this.blue = CreateGame.toSlot(input.blue);
    this.waiting = (input.waiting ?? []).map((id) =>
      normalizePlayerId(id, "EmptySlot", EMPTY_WAITING),
    );
    this.started = input.started ?? true;

    const duplicate = findDuplicate(this.players);
    if (duplicate !== undefined) {
      throw GameCommandInputError.because("DuplicateId", [
        `duplicate player_id: ${duplicate}`,
      ]);
    }
  }

  get players(): PlayerId[] {
    return [
      this.red.forward,
      this.red.goalkeeper,
      this.blue.forward,
      this.blue.goalkeeper,
      ...this.waiting,
    ];
  }

  async execute(ctx: CommandContext): Promise<CreatedGame> {
    const { store, persistence, logger } = ctx;

    const created = await store.create({
      red: this.red,
      blue: this.blue,
      waiting: this.waiting,
      started: this.started,
    });

    logger?.info?.("Game created", {
      type: this.type,
      gameId: created.id,
      players: this.players.length,
      at: this.at,
    });

    persistence.submit({ type: "EnsurePlayers", names: this.players });
    return created;
  }

  private static toSlot(raw: CreateGameInput["red"]): TeamSlot {
    return {
      forward: normalizePlayerId(raw.forward, "EmptySlot", EMPTY_SLOT),
      goalkeeper: normalizePlayerId(raw.goalkeeper, "EmptySlot", EMPTY_SLOT),
    };
  }
}
