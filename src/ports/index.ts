export {
  type LoadTraceEvent,
  type TraceSink,
  noopTraceSink,
  collectingTraceSink,
  consoleTraceSink,
  makeId,
} from "./types";
