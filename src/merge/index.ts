export {
  mergeUnion,
  mergeConsolidate,
  dedupeEntities,
  normalizeEntityKey,
} from "./Merger";
export type { MergeConsolidateOptions } from "./Merger";
