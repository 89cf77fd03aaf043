export type { SourceAdapter } from "./sources/sourceAdapter";
export type { PersistenceSink } from "./persistence/persistenceSink";
