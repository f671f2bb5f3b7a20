import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  CreateGame,
  EnqueuePlayer,
  GameCommandInputError,
  GameNotFoundError,
  GetGame,
  InvalidGameStateError,
  ListGames,
  PlayerNotFoundError,
  RegisterPlayer,
  RemovePlayer,
  ScoreGoal,
  StartGame,
  UndoLastAction,
} from "./core.js";
import type {
  Command,
  CommandContext,
  GameView,
  GoalResult,
  Logger,
  PlayerStore,
} from "./core.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export interface CreateTableAppOptions {
  readonly logger: Logger;
  /** Absent when no database is configured */
  readonly players: PlayerStore | undefined;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
}

interface SlotBody {
  readonly forward?: unknown;
  readonly goalkeeper?: unknown;
}

interface StartGameBody {
  readonly red?: SlotBody;
  readonly blue?: SlotBody;
  readonly waiting?: unknown;
  readonly started?: unknown;
}

type ErrorStatus = 400 | 404 | 409 | 500;

const SEARCH_DEFAULT_LIMIT = 20;
const SEARCH_MAX_LIMIT = 100;
const LEADERBOARD_DEFAULT_LIMIT = 50;
const LEADERBOARD_MAX_LIMIT = 1000;

export function toGameResponse(view: GameView, goal?: GoalResult): Record<string, unknown> {
  return {
    red: view.red,
    blue: view.blue,
    waiting: view.waiting,
    score: view.score,
    started: view.started,
    ...(goal
      ? {
          rotation: {
            benched: goal.rotation.benched,
            moved_to_goalkeeper: goal.rotation.movedToGoalkeeper,
            new_forward: goal.rotation.newForward,
          },
        }
      : {}),
    ...(goal?.fullRotation ? { full_rotation: goal.fullRotation } : {}),
  };
}

export function statusFor(error: unknown): ErrorStatus {
  if (error instanceof GameCommandInputError) {
    return error.code === "DuplicateId" ? 409 : 400;
  }
  if (error instanceof GameNotFoundError || error instanceof PlayerNotFoundError) {
    return 404;
  }
  if (error instanceof InvalidGameStateError) {
    return 409;
  }
  return 500;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof GameCommandInputError) return error.code;
  if (error instanceof InvalidGameStateError) return error.reason;
  if (error instanceof GameNotFoundError) return "GameNotFound";
  if (error instanceof PlayerNotFoundError) return "PlayerNotFound";
  return undefined;
}

function parseLimit(raw: string | undefined, fallback: number, max: number): number {
  const value = Number((raw ?? "").trim());
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    return fallback;
  }
  return value;
}

export function createTableApp({
  logger,
  players,
  createContext,
  dispatch,
}: CreateTableAppOptions): Hono {
  const app = new Hono();

  const run = <TResult>(command: Command<TResult>): Promise<TResult> =>
    dispatch(command, createContext());

  app.use("*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.onError((error, c) => {
    const status = statusFor(error);
    if (status === 500) {
      logger.error?.("Request failed", { path: c.req.path, error });
      return c.json({ error: getErrorMessage(error) }, 500);
    }
    logger.warn?.("Request rejected", { path: c.req.path, status, error: getErrorMessage(error) });
    const code = errorCode(error);
    return c.json({ error: getErrorMessage(error), ...(code ? { code } : {}) }, status);
  });

  app.get("/healthz", (c) => c.text("ok"));

  app.get("/games", async (c) => c.json(await run(new ListGames(Date.now()))));

  app.post("/games/start", async (c) => {
    const body = await c.req.json<StartGameBody>().catch(() => null);
    if (!body || typeof body !== "object") {
      return c.json({ error: "invalid JSON body" }, 400);
    }
    if (body.waiting !== undefined && !Array.isArray(body.waiting)) {
      return c.json({ error: "waiting must be an array" }, 400);
    }

    const waiting: readonly unknown[] = Array.isArray(body.waiting) ? body.waiting : [];
    const command = new CreateGame(
      {
        red: body.red ?? {},
        blue: body.blue ?? {},
        waiting,
        ...(typeof body.started === "boolean" ? { started: body.started } : {}),
      },
      Date.now(),
    );

    const { id, view } = await run(command);
    return c.json({ id, state: toGameResponse(view) });
  });

  app.get("/games/:gameId", async (c) => {
    const view = await run(new GetGame(c.req.param("gameId"), Date.now()));
    return c.json(toGameResponse(view));
  });

  app.post("/games/:gameId/queue", async (c) => {
    const body = await c.req.json<{ readonly player_id?: unknown }>().catch(() => null);
    if (!body) {
      return c.json({ error: "invalid JSON body" }, 400);
    }
    const view = await run(new EnqueuePlayer(c.req.param("gameId"), body.player_id, Date.now()));
    return c.json(toGameResponse(view));
  });

  app.post("/games/:gameId/goal", async (c) => {
    const body = await c.req.json<{ readonly team?: unknown }>().catch(() => null);
    if (!body) {
      return c.json({ error: "invalid JSON body" }, 400);
    }
    const result = await run(new ScoreGoal(c.req.param("gameId"), body.team, Date.now()));
    return c.json(toGameResponse(result.view, result));
  });

  app.post("/games/:gameId/remove", async (c) => {
    const body = await c.req.json<{ readonly player_id?: unknown }>().catch(() => null);
    if (!body) {
      return c.json({ error: "invalid JSON body" }, 400);
    }
    const view = await run(new RemovePlayer(c.req.param("gameId"), body.player_id, Date.now()));
    return c.json(toGameResponse(view));
  });

  app.post("/games/:gameId/begin", async (c) => {
    const view = await run(new StartGame(c.req.param("gameId"), Date.now()));
    return c.json(toGameResponse(view));
  });

  app.post("/games/:gameId/undo", async (c) => {
    const view = await run(new UndoLastAction(c.req.param("gameId"), Date.now()));
    return c.json(toGameResponse(view));
  });

  app.get("/players", async (c) => {
    if (!players) {
      return c.json({ error: "database not configured" }, 501);
    }
    const query = (c.req.query("query") ?? "").trim();
    const limit = parseLimit(c.req.query("limit"), SEARCH_DEFAULT_LIMIT, SEARCH_MAX_LIMIT);
    return c.json(await players.searchPlayers(query, limit));
  });

  app.post("/players", async (c) => {
    if (!players) {
      return c.json({ error: "database not configured" }, 501);
    }
    const body = await c.req.json<{ readonly name?: unknown }>().catch(() => null);
    if (!body) {
      return c.json({ error: "invalid JSON body" }, 400);
    }
    // written through the persistence queue, so only acceptance is known here
    const name = await run(new RegisterPlayer(body.name, Date.now()));
    return c.json({ name }, 202);
  });

  app.get("/leaderboard/data", async (c) => {
    if (!players) {
      return c.json({ error: "database not configured" }, 501);
    }
    const limit = parseLimit(
      c.req.query("limit"),
      LEADERBOARD_DEFAULT_LIMIT,
      LEADERBOARD_MAX_LIMIT,
    );
    return c.json(await players.searchPlayers("", limit));
  });

  return app;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
