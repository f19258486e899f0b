import { MongoClient } from "mongodb";
import type { Collection, Db } from "mongodb";
import type { MongoSettings } from "../../config";
import type { TodoDocument } from "../repositories/mongoTodoRepository";

export interface MongoConnection {
  client: MongoClient;
  db: Db;
  collection: Collection<TodoDocument>;
}

export async function connectMongo(
  config: MongoSettings
): Promise<MongoConnection> {
  const client = new MongoClient(config.mongoUri, {
    serverSelectionTimeoutMS: config.storeTimeoutMs,
  });
  await client.connect();
  const db = client.db(config.dbName);
  return { client, db, collection: db.collection<TodoDocument>(config.collectionName) };
}
