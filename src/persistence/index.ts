export { persist, buildReportSummary, sqlitePersistenceSink } from "./persistenceSink";
