export {
  TokenizerFrom,
  TokenizerFromFile,
} from "./layers.js";

export {
  prettyLogger,
  formatLogLine,
  loggingLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
