/**
 * Command Router
 *
 * Pure function: takes one line of user input → produces an operation request or a
 * client command. No I/O, no state, no connection logic. Front ends call this and run
 * the result.
 */

import { getClientCommand, getOperation } from "./catalog.js";
import type { ClientCommandName, OperationRequest, RouteContext } from "./types.js";

export type RouteResult =
  | { kind: "operation"; request: OperationRequest }
  | { kind: "client"; command: ClientCommandName }
  | { kind: "invalid"; message: string }
  | { kind: "empty" };

/**
 * Route user input.
 *
 * @param input - Raw user input, e.g. `restore "my notes.txt" --as tmp`
 * @param context - Client state the router needs (the configured backup list)
 */
export function routeInput(input: string, context: RouteContext = { backupFiles: [] }): RouteResult {
  const tokens = tokenize(input);
  if (tokens === null) {
    return { kind: "invalid", message: "Unterminated quote" };
  }
  return routeTokens(tokens, context);
}

/**
 * Route an already-split command line, e.g. `["restore", "a.txt", "--as", "tmp"]`.
 */
export function routeTokens(tokens: readonly string[], context: RouteContext = { backupFiles: [] }): RouteResult {
  if (tokens.length === 0) {
    return { kind: "empty" };
  }

  const [name, ...rest] = tokens;
  const command = name.toLowerCase();

  const client = getClientCommand(command);
  if (client) {
    return { kind: "client", command: client.name };
  }

  const operation = getOperation(command);
  if (!operation) {
    return { kind: "invalid", message: `Unknown command "${name}". Type "help" for commands.` };
  }

  // Split positional arguments from --options
  const files: string[] = [];
  const options: Record<string, string> = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token.startsWith("--")) {
      files.push(token);
      continue;
    }
    const optionName = token.slice(2);
    if (!operation.options.some((opt) => opt.name === optionName)) {
      return { kind: "invalid", message: `Unknown option ${token} for ${operation.name}` };
    }
    if (i + 1 >= rest.length) {
      return { kind: "invalid", message: `${token} needs a value` };
    }
    options[optionName] = rest[++i];
  }

  const args = operation.args;
  if (args.type === "none" && files.length > 0) {
    return { kind: "invalid", message: `"${operation.name}" takes no arguments` };
  }

  if (args.type === "file_list" && files.length === 0) {
    if (args.defaultsToBackupList && context.backupFiles.length > 0) {
      files.push(...context.backupFiles);
    } else if (args.required) {
      return { kind: "invalid", message: `Usage: ${operation.usage}` };
    }
  }

  const problem = operation.validate?.(files, options);
  if (problem) {
    return { kind: "invalid", message: problem };
  }

  return { kind: "operation", request: operation.toRequest(files, options) };
}

/**
 * Split on whitespace; double quotes group words. Returns null on an unterminated quote.
 */
export function tokenize(input: string): string[] | null {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quoted = false;

  for (const ch of input.trim()) {
    if (ch === '"') {
      quoted = !quoted;
      inToken = true;
    } else if (!quoted && /\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = "";
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quoted) return null;
  if (inToken) tokens.push(current);
  return tokens;
}
