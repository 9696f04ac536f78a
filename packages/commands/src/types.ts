/**
 * Command and request types — UI-technology agnostic.
 *
 * These types describe the operations a stowage client can run and the argument
 * schemas behind them, so any front end (CLI, shell, scripts) can route user input.
 */

// =============================================================================
// Operation requests — what the protocol engine runs
// =============================================================================

export type OperationKind = "list" | "backup" | "restore" | "delete";

export interface ListOperation {
  op: "list";
}

export interface BackupOperation {
  op: "backup";
  /** Local paths, backed up in order */
  files: string[];
}

export interface RestoreOperation {
  op: "restore";
  /** Stored filenames, restored in order */
  files: string[];
  /** Local path to write to instead of the stored name (single file only) */
  saveAs?: string;
}

export interface DeleteOperation {
  op: "delete";
  files: string[];
}

export type OperationRequest = ListOperation | BackupOperation | RestoreOperation | DeleteOperation;

// =============================================================================
// Argument Schemas — describe what a command accepts
// =============================================================================

/** Command takes no arguments */
export interface ArgNone {
  type: "none";
}

/** Command takes a list of file names */
export interface ArgFileList {
  type: "file_list";
  required: boolean;
  placeholder: string;
  /** An empty list falls back to the configured backup list */
  defaultsToBackupList?: boolean;
}

export type ArgSchema = ArgNone | ArgFileList;

/** A `--name <value>` option */
export interface OptionDef {
  name: string;
  placeholder: string;
  description: string;
}

// =============================================================================
// Command listing — one type for operations and client commands
// =============================================================================

export type ClientCommandName = "help" | "status" | "clear" | "quit";

export interface CommandInfo {
  name: string;
  description: string;
  usage: string;
  /** Operations go to the server; client commands stay in the front end */
  source: "operation" | "client";
  args?: ArgSchema;
}

/** What the router needs to know about the running client */
export interface RouteContext {
  /** Files listed in the backup list, used by a bare `backup` */
  backupFiles: readonly string[];
}
