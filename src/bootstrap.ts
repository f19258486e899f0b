import { createApp } from "./app";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import type { TodoRepository } from "./core/ports/TodoRepository";
import { connectMongo } from "./infrastructure/database/mongo";
import InMemoryTodoRepository from "./infrastructure/repositories/inMemoryTodoRepository";
import MongoTodoRepository from "./infrastructure/repositories/mongoTodoRepository";
import { startHttpServer } from "./lifecycle";

export interface Store {
  repo: TodoRepository;
  close(): Promise<void>;
}

export type OpenStore = (config: AppConfig) => Promise<Store>;

export const openStore: OpenStore = async (config) => {
  if (config.store === "memory") {
    console.warn("TODO_STORE=memory: todos are kept in process memory only");
    return { repo: new InMemoryTodoRepository(), close: async () => {} };
  }
  const { client, db, collection } = await connectMongo(config.mongo);
  console.log(`Connected to MongoDB (${config.mongo.dbName}.${config.mongo.collectionName})`);
  return {
    repo: new MongoTodoRepository(db, collection, { timeoutMs: config.storeTimeoutMs }),
    close: () => client.close(),
  };
};

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once("SIGINT", resolve);
    process.once("SIGTERM", resolve);
  });
}

/**
 * Serves until SIGINT or SIGTERM. Configuration and startup failures reject;
 * the store is closed on every path once it has been opened.
 */
export async function main(env: NodeJS.ProcessEnv = process.env, open: OpenStore = openStore): Promise<void> {
  const config = loadConfig(env);
  const store = await open(config);
  try {
    const app = createApp({ repo: store.repo, logFormat: config.logFormat });
    const running = await startHttpServer(app, { port: config.port, host: config.host });
    console.log(`Listening on port ${running.port}`);

    const signal = await waitForShutdownSignal();
    console.log(`${signal} received, shutting down server...`);
    await running.stop(config.shutdownTimeoutMs);
    console.log("Server gracefully stopped");
  } finally {
    await store.close();
  }
}

/** Process entry: a failed `main` is logged and turns into a non-zero exit code. */
export async function run(env: NodeJS.ProcessEnv = process.env, open: OpenStore = openStore): Promise<void> {
  try {
    await main(env, open);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
