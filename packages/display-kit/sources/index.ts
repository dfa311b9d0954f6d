export { displayConfigParse } from "./config/displayConfigParse.js";
export { displayConfigResolve } from "./config/displayConfigResolve.js";
export type { DisplayConfig, DisplayConfigEnv, DisplayConfigInput } from "./config/displayConfigTypes.js";
export { type DisplayFormatter, displayFormatterCreate } from "./displayFormatterCreate.js";
export { getLogger, initLogging, type LogConfig, resetLogging } from "./log.js";
export { OPTION_NONE, optionDisplay, optionDisplayDebug } from "./option/optionDisplay.js";
export { resultDisplay } from "./result/resultDisplay.js";
export {
    SLICE_DEFAULT_LIMIT,
    SLICE_ELISION_MARKER,
    type SliceBraces,
    type SliceDisplayOptions,
    sliceDisplay
} from "./slice/sliceDisplay.js";
export {
    UNIX_TIMESTAMP_MAX_MILLIS,
    type UnixTimestampDisplayOptions,
    type UnixTimestampPrecision,
    unixTimestampDisplay,
    unixTimestampDisplayShort
} from "./timestamp/unixTimestampDisplay.js";
export { UnixTimestampError, type UnixTimestampErrorKind } from "./timestamp/unixTimestampError.js";
export {
    type Display,
    type Option,
    type Result,
    type ResultErr,
    type ResultOk,
    resultErr,
    resultOk
} from "./types.js";
export { valueDebug } from "./value/valueDebug.js";
export { valueDisplay } from "./value/valueDisplay.js";
