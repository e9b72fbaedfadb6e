/**
 * Utility exports
 */

// URL utilities
export { isRemoteUrl } from "./is-remote-url";
export { urlBasename } from "./url-basename";
export { inferExtension, isImageExtension } from "./infer-extension";

// Path utilities
export { toRelativeLink } from "./to-relative-link";

// Filesystem utilities
export { fileExists } from "./file-exists";
export { replaceFile } from "./replace-file";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Errors
export { InvalidInputPathError, FetchError, WriteError } from "./errors";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
