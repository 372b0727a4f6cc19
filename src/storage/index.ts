export { FileActivityStorage, FilePromptHistoryStorage } from "./file-storage";
export { InMemoryActivityStorage, InMemoryPromptHistoryStorage } from "./memory-storage";
export {
  ACTIVITY_FILENAME,
  APP_DIRECTORY_NAME,
  HISTORY_FILENAME,
  SETTINGS_FILENAME,
  getDataRoot,
  resolvePromptStatePaths,
  type DataRootOptions,
  type PromptStatePaths,
} from "./paths";
export { decodeActivity, decodeHistory, encodeActivity, encodeHistory, STATE_FILE_VERSION } from "./codec";
