import { type PostgresJsDatabase, drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "./schema";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseInstance {
  db: Database;
  close: () => Promise<void>;
}

export const createDatabase = (connectionUrl: string): DatabaseInstance => {
  const postgresClient = postgres(connectionUrl, {
    max: 10,
  });

  const database = drizzle(postgresClient, { schema });

  return {
    db: database,
    close: async (): Promise<void> => {
      await postgresClient.end();
    },
  };
};

