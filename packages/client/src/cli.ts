#!/usr/bin/env node
/**
 * stowage CLI
 *
 * Usage:
 *   stowage list
 *   stowage backup [file...]
 *   stowage restore <name...> [--as <path>]
 *   stowage delete <name...>
 *   stowage session
 *   stowage shell
 *
 * Results go to stdout, progress and diagnostics to stderr.
 * Exit status: 0 when every operation succeeded, 1 otherwise, 2 on usage or config errors.
 */

import React from "react";
import { render } from "ink";
import { buildSessionScript, describeRequest, routeTokens } from "@stowage/commands";
import { PROTOCOL_VERSION, type Endpoint } from "@stowage/protocol";
import { helpText, parseArgs, UsageError, type CliOptions, type ParsedArgs } from "./args.js";
import App from "./app.js";
import { ConfigError, generateUserId, parseEndpoint, readBackupInfo, readServerInfo } from "./config.js";
import { BackupClient } from "./engine.js";
import { formatPhase, formatResult } from "./format.js";
import type { OperationResult, OperationState } from "./operation.js";
import { runScript } from "./session.js";
import { formatEndpoint } from "./state.js";

async function main(): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) return usageFailure(err.message);
    throw err;
  }

  const { command, tokens, options } = parsed;
  if (command === "help") {
    console.log(helpText());
    return 0;
  }

  try {
    const endpoint = await resolveEndpoint(options);
    const userId = options.userId ?? generateUserId();

    switch (command) {
      case "shell":
        return await runShell(endpoint, userId, options);
      case "session":
        return await runSession(endpoint, userId, options);
      case "operation":
        return await runOperation(endpoint, userId, tokens, options);
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`✗ ${err.message}\n`);
      return 2;
    }
    if (err instanceof UsageError) return usageFailure(err.message);
    throw err;
  }
}

// =============================================================================
// Commands
// =============================================================================

async function runOperation(endpoint: Endpoint, userId: number, tokens: string[], options: CliOptions): Promise<number> {
  // Only `backup` with no files reads the backup list
  const needsBackupList = tokens.length === 1 && tokens[0].toLowerCase() === "backup";
  const backupFiles = needsBackupList ? await readBackupInfo(options.backupInfo) : [];

  const route = routeTokens(tokens, { backupFiles });
  switch (route.kind) {
    case "empty":
      throw new UsageError("No command given");
    case "invalid":
      throw new UsageError(route.message);
    case "client":
      throw new UsageError(`"${route.command}" is only available in the shell`);
    case "operation":
      break;
  }

  const client = createClient(endpoint, userId, options);
  const result = await client.run(route.request);
  report(result);
  return result.ok ? 0 : 1;
}

async function runSession(endpoint: Endpoint, userId: number, options: CliOptions): Promise<number> {
  const backupFiles = await readBackupInfo(options.backupInfo);
  if (backupFiles.length === 0) {
    throw new ConfigError(`${options.backupInfo} lists no files`);
  }

  const client = createClient(endpoint, userId, options);
  const script = buildSessionScript(backupFiles);
  process.stderr.write(`Session: ${script.length} operations as user ${userId}\n`);

  const results = await runScript(client, script, (request, result) => {
    console.log(`\n${describeRequest(request)}`);
    report(result);
  });
  return results.every((r) => r.ok) ? 0 : 1;
}

async function runShell(endpoint: Endpoint, userId: number, options: CliOptions): Promise<number> {
  let backupFiles: string[] = [];
  try {
    backupFiles = await readBackupInfo(options.backupInfo);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`⚠ ${err.message} (backup without arguments is unavailable)\n`);
  }

  const instance = render(
    React.createElement(App, {
      endpoint,
      userId,
      protocolVersion: PROTOCOL_VERSION,
      backupFiles,
      timeoutMs: options.timeoutMs,
    }),
  );
  await instance.waitUntilExit();
  return 0;
}

// =============================================================================
// Helpers
// =============================================================================

async function resolveEndpoint(options: CliOptions): Promise<Endpoint> {
  if (options.server !== undefined) return parseEndpoint(options.server);
  return readServerInfo(options.serverInfo);
}

function createClient(endpoint: Endpoint, userId: number, options: CliOptions): BackupClient {
  if (options.verbose) {
    process.stderr.write(`⟳ ${formatEndpoint(endpoint)} as user ${userId}, protocol v${PROTOCOL_VERSION}\n`);
  }
  return new BackupClient({
    endpoint,
    userId,
    timeoutMs: options.timeoutMs,
    onUpdate: options.verbose ? logPhase : undefined,
  });
}

function logPhase(state: OperationState): void {
  process.stderr.write(`  ${formatPhase(state)}\n`);
}

function report(result: OperationResult): void {
  for (const line of formatResult(result)) {
    console.log(line);
  }
}

function usageFailure(message: string): number {
  process.stderr.write(`${message}\nRun "stowage --help" for usage.\n`);
  return 2;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal: ${err}`);
    process.exit(1);
  },
);
