/**
 * Repository Module - Public API
 */
export type { MemoryRepositoryOptions, Repository } from "./schema.js";
export { MemoryRepository } from "./service.js";
