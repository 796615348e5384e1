export {
  RngLive,
  RngFrom,
  BackendFrom,
  BackendLive,
  AugmentRuntime,
} from "./layers.js";

export {
  prettyLogger,
  prettyLoggerLayer,
  formatMessage,
  withSpan,
  parseLogLevel,
} from "./logging.js";
