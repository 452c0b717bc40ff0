/**
 * Signal source exports
 */

export { DirectorySignalSource, parseDelimited, SIGNAL_FILES } from "./directory.js";
export { JsonSignalSource } from "./json.js";
