import { describe, expect, it } from "vitest";

import { standardGame } from "./support/mocks.js";
import {
  InMemoryGameStore,
  randomGameId,
} from "../src/adapters/in-memory/InMemoryGameStore.js";
import { applyGoal } from "../src/domain/entities/RotationRules.js";
import { GameNotFoundError } from "../src/domain/errors/index.js";
import { createTableConfig } from "../src/domain/TableConfig.js";

function sequence(...ids: string[]): () => string {
  let index = 0;
  return () => ids[index++] ?? `overflow-${index}`;
}

describe("InMemoryGameStore", () => {
  it("generates 24 hex character identifiers", () => {
    expect(randomGameId()).toMatch(/^[0-9a-f]{24}$/);
  });

  it("creates a game and returns its initial view", async () => {
    const store = new InMemoryGameStore({ generateId: sequence("g1") });

    const created = await store.create(standardGame());

    expect(created).toEqual({
      id: "g1",
      view: {
        id: "g1",
        red: { forward: "p1", goalkeeper: "p2" },
        blue: { forward: "p3", goalkeeper: "p4" },
        waiting: ["p5", "p6", "p7"],
        score: { red: 0, blue: 0 },
        started: true,
      },
    });
    expect(store.size).toBe(1);
  });

  it("draws a fresh identifier when the generated one is taken", async () => {
    const store = new InMemoryGameStore({ generateId: sequence("same", "same", "other") });

    const first = await store.create(standardGame());
    const second = await store.create(standardGame());

    expect(first.id).toBe("same");
    expect(second.id).toBe("other");
    expect(store.size).toBe(2);
  });

  it("applies updates to the stored game", async () => {
    const store = new InMemoryGameStore({ generateId: sequence("g1") });
    const { id } = await store.create(standardGame());

    await store.update(id, (state) => applyGoal(state, "red"));
    const score = await store.read(id, (state) => ({ ...state.score }));

    expect(score).toEqual({ red: 1, blue: 0 });
  });

  it("reports unknown games", async () => {
    const store = new InMemoryGameStore();

    await expect(store.read("missing", () => undefined)).rejects.toThrow(GameNotFoundError);
    await expect(store.update("missing", () => undefined)).rejects.toThrow(
      "Game not found: missing",
    );
  });

  it("keeps serving after a failed update", async () => {
    const store = new InMemoryGameStore({ generateId: sequence("g1") });
    const { id } = await store.create(standardGame({ waiting: [] }));

    await expect(store.update(id, (state) => applyGoal(state, "blue"))).rejects.toThrow(
      "waiting queue empty; cannot rotate losing team",
    );

    await expect(store.read(id, (state) => state.history.length)).resolves.toBe(0);
  });

  it("lists a summary of every game", async () => {
    const store = new InMemoryGameStore({ generateId: sequence("g1", "g2") });
    await store.create(standardGame());
    await store.create(standardGame({ started: false }));
    await store.update("g1", (state) => applyGoal(state, "blue"));

    const summaries = await store.list();

    expect(summaries).toEqual([
      { id: "g1", started: true, score: { red: 0, blue: 1 } },
      { id: "g2", started: false, score: { red: 0, blue: 0 } },
    ]);
  });

  it("sizes new queues from the configured minimum", async () => {
    const store = new InMemoryGameStore({
      generateId: sequence("g1"),
      config: createTableConfig({ minQueueCapacity: 2 }),
    });
    await store.create(standardGame({ waiting: ["p5"] }));

    const capacity = await store.read("g1", (state) => state.waiting.capacity);

    expect(capacity).toBe(2);
  });
});
