import { describe, expect, it, vi } from "vitest";

import type { DispatchCommand } from "../src/app.js";
import { createPlayerStoreMock } from "../../../tests/support/mocks.js";
import { createTestApp, createTestContext, postJson } from "./support/testContext.js";

const STANDARD_START = {
  red: { forward: "p1", goalkeeper: "p2" },
  blue: { forward: "p3", goalkeeper: "p4" },
  waiting: ["p5", "p6", "p7"],
};

async function startedApp(start: unknown = STANDARD_START) {
  const testContext = createTestContext();
  const app = createTestApp(testContext);
  const response = await app.request("/games/start", postJson(start));
  expect(response.status).toBe(200);
  return { app, testContext };
}

describe("table HTTP routes", () => {
  it("reports health status", async () => {
    const app = createTestApp(createTestContext());

    const response = await app.request("/healthz");

    expect(response.status).toBe(200);
    expect(await response.text()).toBe("ok");
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("answers CORS preflight requests", async () => {
    const app = createTestApp(createTestContext());

    const response = await app.request("/games/start", { method: "OPTIONS" });

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-methods")).toBe("GET,POST,OPTIONS");
  });

  it("creates a game via POST /games/start", async () => {
    const testContext = createTestContext();
    const app = createTestApp(testContext);

    const response = await app.request("/games/start", postJson(STANDARD_START));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      id: "g1",
      state: {
        red: { forward: "p1", goalkeeper: "p2" },
        blue: { forward: "p3", goalkeeper: "p4" },
        waiting: ["p5", "p6", "p7"],
        score: { red: 0, blue: 0 },
        started: true,
      },
    });
    expect(testContext.persistence.submit).toHaveBeenCalledWith({
      type: "EnsurePlayers",
      names: ["p1", "p2", "p3", "p4", "p5", "p6", "p7"],
    });
  });

  it("returns 400 for malformed start payloads", async () => {
    const app = createTestApp(createTestContext());

    const notJson = await app.request("/games/start", postJson("{nope"));
    const badWaiting = await app.request(
      "/games/start",
      postJson({ ...STANDARD_START, waiting: "p5" }),
    );
    const emptySlot = await app.request(
      "/games/start",
      postJson({ ...STANDARD_START, blue: { forward: "p3" } }),
    );

    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toEqual({ error: "invalid JSON body" });
    expect(badWaiting.status).toBe(400);
    expect(await badWaiting.json()).toEqual({ error: "waiting must be an array" });
    expect(emptySlot.status).toBe(400);
    expect(await emptySlot.json()).toEqual({
      error: "empty player_id in active slots",
      code: "EmptySlot",
    });
  });

  it("returns 409 for duplicate players", async () => {
    const app = createTestApp(createTestContext());

    const response = await app.request(
      "/games/start",
      postJson({ ...STANDARD_START, waiting: ["p5", "p2"] }),
    );

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      error: "duplicate player_id: p2",
      code: "DuplicateId",
    });
  });

  it("scores a goal and reports the rotation", async () => {
    const { app } = await startedApp();

    const response = await app.request("/games/g1/goal", postJson({ team: "red" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      red: { forward: "p1", goalkeeper: "p2" },
      blue: { forward: "p5", goalkeeper: "p3" },
      waiting: ["p6", "p7", "p4"],
      score: { red: 1, blue: 0 },
      started: true,
      rotation: { benched: "p4", moved_to_goalkeeper: "p3", new_forward: "p5" },
    });
  });

  it("includes the full rotation once the cycle completes", async () => {
    const { app } = await startedApp({ ...STANDARD_START, waiting: ["p5"] });

    await app.request("/games/g1/goal", postJson({ team: "red" }));
    await app.request("/games/g1/goal", postJson({ team: "red" }));
    const response = await app.request("/games/g1/goal", postJson({ team: "red" }));

    const body = (await response.json()) as Record<string, unknown>;
    expect(body["full_rotation"]).toEqual({ team: "red", players: ["p1", "p2"] });
  });

  it("maps domain failures to status codes", async () => {
    const { app } = await startedApp({ ...STANDARD_START, waiting: [] });

    const emptyQueue = await app.request("/games/g1/goal", postJson({ team: "blue" }));
    const badTeam = await app.request("/games/g1/goal", postJson({ team: "green" }));
    const unknownGame = await app.request("/games/nope");
    const unknownPlayer = await app.request("/games/g1/remove", postJson({ player_id: "zed" }));
    const nothingToUndo = await app.request("/games/g1/undo", { method: "POST" });

    expect(emptyQueue.status).toBe(409);
    expect(await emptyQueue.json()).toEqual({
      error: "waiting queue empty; cannot rotate losing team",
      code: "QueueEmpty",
    });
    expect(badTeam.status).toBe(400);
    expect(await badTeam.json()).toEqual({
      error: "team must be 'red' or 'blue'",
      code: "InvalidTeam",
    });
    expect(unknownGame.status).toBe(404);
    expect(await unknownGame.json()).toEqual({
      error: "Game not found: nope",
      code: "GameNotFound",
    });
    expect(unknownPlayer.status).toBe(404);
    expect(await unknownPlayer.json()).toEqual({
      error: "Player not found in game: zed",
      code: "PlayerNotFound",
    });
    expect(nothingToUndo.status).toBe(409);
    expect(await nothingToUndo.json()).toEqual({
      error: "no actions to undo",
      code: "NoHistory",
    });
  });

  it("queues, removes and undoes", async () => {
    const { app } = await startedApp();

    const queued = await app.request("/games/g1/queue", postJson({ player_id: "p8" }));
    expect(await queued.json()).toMatchObject({ waiting: ["p5", "p6", "p7", "p8"] });

    const removed = await app.request("/games/g1/remove", postJson({ player_id: "p6" }));
    expect(await removed.json()).toMatchObject({ waiting: ["p5", "p7", "p8"] });

    await app.request("/games/g1/undo", { method: "POST" });
    const restored = await app.request("/games/g1");

    expect(await restored.json()).toEqual({
      red: { forward: "p1", goalkeeper: "p2" },
      blue: { forward: "p3", goalkeeper: "p4" },
      waiting: ["p5", "p6", "p7", "p8"],
      score: { red: 0, blue: 0 },
      started: true,
    });
  });

  it("begins an idle game and lists games", async () => {
    const { app } = await startedApp({ ...STANDARD_START, started: false });

    const begun = await app.request("/games/g1/begin", { method: "POST" });
    const again = await app.request("/games/g1/begin", { method: "POST" });
    const listed = await app.request("/games");

    expect(begun.status).toBe(200);
    expect(again.status).toBe(409);
    expect(await listed.json()).toEqual([
      { id: "g1", started: true, score: { red: 0, blue: 0 } },
    ]);
  });

  it("returns 500 for unexpected failures and logs them", async () => {
    const testContext = createTestContext();
    const dispatch: DispatchCommand = vi.fn(() => Promise.reject(new Error("boom")));
    const app = createTestApp(testContext, { dispatch });

    const response = await app.request("/games");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "boom" });
    expect(testContext.logger.error).toHaveBeenCalledWith(
      "Request failed",
      expect.objectContaining({ path: "/games" }),
    );
  });
});

describe("player routes", () => {
  it("answer 501 without a database", async () => {
    const app = createTestApp(createTestContext());

    const search = await app.request("/players?query=a");
    const register = await app.request("/players", postJson({ name: "alice" }));
    const leaderboard = await app.request("/leaderboard/data");

    expect([search.status, register.status, leaderboard.status]).toEqual([501, 501, 501]);
    expect(await search.json()).toEqual({ error: "database not configured" });
  });

  it("search with a bounded limit", async () => {
    const players = createPlayerStoreMock();
    players.searchPlayers.mockResolvedValue([
      { id: 7, name: "alice", wins: 3, survives: 5, fullRotations: 1 },
    ]);
    const app = createTestApp(createTestContext(), { players });

    const search = await app.request("/players?query=%20al%20&limit=500");
    const leaderboard = await app.request("/leaderboard/data?limit=5");

    expect(await search.json()).toEqual([
      { id: 7, name: "alice", wins: 3, survives: 5, fullRotations: 1 },
    ]);
    expect(players.searchPlayers).toHaveBeenNthCalledWith(1, "al", 20);
    expect(players.searchPlayers).toHaveBeenNthCalledWith(2, "", 5);
    expect(leaderboard.status).toBe(200);
  });

  it("registers a player through the persistence queue", async () => {
    const testContext = createTestContext();
    const app = createTestApp(testContext, { players: createPlayerStoreMock() });

    const response = await app.request("/players", postJson({ name: " bob " }));

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({ name: "bob" });
    expect(testContext.persistence.submit).toHaveBeenCalledWith({
      type: "EnsurePlayers",
      names: ["bob"],
    });
  });
});
