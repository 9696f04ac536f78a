// Types
export type {
  OperationKind,
  OperationRequest,
  ListOperation,
  BackupOperation,
  RestoreOperation,
  DeleteOperation,
  ArgSchema,
  ArgNone,
  ArgFileList,
  OptionDef,
  ClientCommandName,
  CommandInfo,
  RouteContext,
} from "./types.js";

// Catalog
export {
  OPERATIONS,
  CLIENT_COMMANDS,
  getOperation,
  getClientCommand,
  getCommands,
  describeRequest,
} from "./catalog.js";
export type { OperationDef, ClientCommandDef } from "./catalog.js";

// Router
export { routeInput, routeTokens, tokenize } from "./router.js";
export type { RouteResult } from "./router.js";

// Session script
export { buildSessionScript, SESSION_RESTORE_TARGET } from "./script.js";
