/**
 * Command Catalog
 *
 * The operations a stowage client can run, defined as data so front ends can route,
 * validate and describe them.
 *
 * This is the ONE place where operation commands are defined.
 */

import type {
  ArgSchema,
  ClientCommandName,
  CommandInfo,
  OperationKind,
  OperationRequest,
  OptionDef,
} from "./types.js";

export interface OperationDef {
  name: OperationKind;
  description: string;
  usage: string;
  args: ArgSchema;
  options: readonly OptionDef[];
  /**
   * Extra checks once the generic argument checks pass.
   * Returns an error message, or undefined when the input is acceptable.
   */
  validate?(files: readonly string[], options: Readonly<Record<string, string>>): string | undefined;
  /** Map parsed arguments to the request the engine runs */
  toRequest(files: string[], options: Readonly<Record<string, string>>): OperationRequest;
}

/**
 * All operations, in the order a typical session uses them.
 */
export const OPERATIONS: readonly OperationDef[] = [
  {
    name: "list",
    description: "List the files stored for this user",
    usage: "list",
    args: { type: "none" },
    options: [],
    toRequest() {
      return { op: "list" };
    },
  },
  {
    name: "backup",
    description: "Upload local files (no args = files from the backup list)",
    usage: "backup [file...]",
    args: { type: "file_list", required: true, placeholder: "file", defaultsToBackupList: true },
    options: [],
    toRequest(files) {
      return { op: "backup", files };
    },
  },
  {
    name: "restore",
    description: "Download stored files",
    usage: "restore <name...> [--as <path>]",
    args: { type: "file_list", required: true, placeholder: "name" },
    options: [{ name: "as", placeholder: "path", description: "Local path to write the file to" }],
    validate(files, options) {
      if (options.as !== undefined && files.length > 1) {
        return "--as takes a single file name";
      }
      return undefined;
    },
    toRequest(files, options) {
      return options.as !== undefined ? { op: "restore", files, saveAs: options.as } : { op: "restore", files };
    },
  },
  {
    name: "delete",
    description: "Delete stored files",
    usage: "delete <name...>",
    args: { type: "file_list", required: true, placeholder: "name" },
    options: [],
    toRequest(files) {
      return { op: "delete", files };
    },
  },
];

export interface ClientCommandDef {
  name: ClientCommandName;
  aliases: readonly string[];
  description: string;
}

/** Commands handled by the front end itself */
export const CLIENT_COMMANDS: readonly ClientCommandDef[] = [
  { name: "help", aliases: ["?"], description: "Show available commands" },
  { name: "status", aliases: [], description: "Show server, user and protocol version" },
  { name: "clear", aliases: [], description: "Clear the operation history" },
  { name: "quit", aliases: ["exit"], description: "Leave the shell" },
];

const operationsByName = new Map<string, OperationDef>(
  OPERATIONS.map((op) => [op.name, op]),
);

const clientCommandsByName = new Map<string, ClientCommandDef>(
  CLIENT_COMMANDS.flatMap((cmd) => [cmd.name, ...cmd.aliases].map((name) => [name, cmd] as const)),
);

/** Get an operation by name, or undefined if there is none */
export function getOperation(name: string): OperationDef | undefined {
  return operationsByName.get(name);
}

/** Get a client command by name or alias */
export function getClientCommand(name: string): ClientCommandDef | undefined {
  return clientCommandsByName.get(name);
}

/** All commands, operations first */
export function getCommands(): CommandInfo[] {
  return [
    ...OPERATIONS.map((op) => ({
      name: op.name,
      description: op.description,
      usage: op.usage,
      source: "operation" as const,
      args: op.args,
    })),
    ...CLIENT_COMMANDS.map((cmd) => ({
      name: cmd.name,
      description: cmd.description,
      usage: cmd.name,
      source: "client" as const,
    })),
  ];
}

/** One-line description of a request, e.g. `restore a.txt → tmp` */
export function describeRequest(request: OperationRequest): string {
  switch (request.op) {
    case "list":
      return "list";
    case "restore":
      return request.saveAs !== undefined
        ? `restore ${request.files.join(", ")} → ${request.saveAs}`
        : `restore ${request.files.join(", ")}`;
    case "backup":
    case "delete":
      return `${request.op} ${request.files.join(", ")}`;
  }
}
