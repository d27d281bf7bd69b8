export { createDatabase, type Database, type DatabaseInstance } from "./client";
export type { HedgeExecutionRepository } from "./ports/hedge-execution-repository";
export { createPostgresHedgeExecutionRepository } from "./adapters/postgres/hedge-execution-repository";
export {
  createInMemoryHedgeExecutionRepository,
  type InMemoryHedgeExecutionRepository,
} from "./adapters/memory/hedge-execution-repository";
