export { type Formatter } from "./formatter.js";
export { formatJson } from "./json.js";
export { formatTerminalCompact } from "./terminal-compact.js";
export { methodName, describeOrdering } from "./method-helpers.js";
