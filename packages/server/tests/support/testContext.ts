import { createTableApp, type DispatchCommand } from "../../src/app.js";
import { InMemoryGameStore, createTableConfig, dispatchCommand } from "../../src/core.js";
import type { CommandContext, PlayerStore } from "../../src/core.js";
import {
  createLoggerMock,
  createPersistenceQueueMock,
  type LoggerMock,
  type PersistenceQueueMock,
} from "../../../../tests/support/mocks.js";

export interface TestContext {
  readonly store: InMemoryGameStore;
  readonly persistence: PersistenceQueueMock;
  readonly logger: LoggerMock;
  readonly createContext: () => CommandContext;
}

export function createTestContext(ids: readonly string[] = ["g1", "g2", "g3"]): TestContext {
  let next = 0;
  const store = new InMemoryGameStore({
    generateId: () => ids[next++] ?? `game-${next}`,
  });
  const persistence = createPersistenceQueueMock();
  const logger = createLoggerMock();
  const config = createTableConfig();

  return {
    store,
    persistence,
    logger,
    createContext: () => ({ store, persistence, config, logger }),
  };
}

export interface TestAppOptions {
  readonly players?: PlayerStore;
  readonly dispatch?: DispatchCommand;
}

export function createTestApp(testContext: TestContext, options: TestAppOptions = {}) {
  return createTableApp({
    logger: testContext.logger,
    players: options.players,
    createContext: testContext.createContext,
    dispatch: options.dispatch ?? dispatchCommand,
  });
}

export function postJson(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}
