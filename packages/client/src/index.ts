/**
 * @stowage/client — TCP client and terminal UI for stowage servers
 */

export {
  connect,
  createConnector,
  SocketConnection,
  type ByteConnection,
  type ConnectOptions,
  type Connector,
  type SocketOpener,
} from "./connection.js";
export { BackupClient, DEFAULT_CHUNK_SIZE, type BackupClientOptions, type RestoreOptions } from "./engine.js";
export { LocalFileAdapter, type FileAdapter } from "./files.js";
export {
  createOperationState,
  operationReducer,
  isTerminal,
  toResult,
  type OperationPhase,
  type OperationState,
  type OperationAction,
  type OperationResult,
  type OperationError,
  type FileOutcome,
  type FailureReason,
} from "./operation.js";
export {
  ConfigError,
  parseEndpoint,
  parseBackupList,
  parseUserId,
  readServerInfo,
  readBackupInfo,
  generateUserId,
} from "./config.js";
export { runScript, type ScriptStepListener } from "./session.js";
export { createSubmitHandler, helpLines, type ShellDeps } from "./shell.js";
export { formatSize, formatListing, formatOutcome, formatResult, formatPhase } from "./format.js";
export { default as App, type AppProps } from "./app.js";
export { appReducer, createInitialState, type AppState, type AppAction, type HistoryEntry } from "./state.js";
