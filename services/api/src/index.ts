export { comparePages } from "./lib/align";
export { compareDocuments } from "./lib/compare";
export { DEFAULT_GROUPING, canGroup, groupRecords, mergeRecords } from "./lib/group";
export { diffWords, inferOperation, toRecordOperation, type InferredTag } from "./lib/inlineDiff";
export { LayoutJsonIngestor, cleanStrayCharacters, pagesFromLayout, type DocumentIngestor, type IngestOptions } from "./lib/ingest";
export { matchingBlocks, opcodes, type MatchingBlock, type Opcode } from "./lib/sequence";
export { summarize, toDiffResponse, type DiffResponseJson } from "./lib/serialize";
export { tokenize } from "./lib/text";
export { renderUnifiedDiff } from "./lib/unifiedDiff";
export type * from "./lib/types";
