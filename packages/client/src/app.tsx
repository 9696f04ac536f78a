/**
 * Shell — Interactive Ink Application
 *
 * Renders the interactive terminal UI:
 * - Status bar (server, user id, protocol version)
 * - Operation history (finished entries in <Static>)
 * - Live per-file progress of the running operation
 * - Text prompt, routed through routeInput
 */

import React, { useReducer, useCallback, useMemo, useRef, useState } from "react";
import { Box, Text, Static, useApp, useStdout } from "ink";
import TextInput from "ink-text-input";
import type { Endpoint } from "@stowage/protocol";
import type { Connector } from "./connection.js";
import { BackupClient } from "./engine.js";
import { formatListing, formatOutcome, formatPhase } from "./format.js";
import { createSubmitHandler } from "./shell.js";
import {
  appReducer,
  createInitialState,
  formatEndpoint,
  type AppState,
  type HistoryEntry,
} from "./state.js";
import type { FileAdapter } from "./files.js";
import type { OperationState } from "./operation.js";

// =============================================================================
// Main App
// =============================================================================

export interface AppProps {
  endpoint: Endpoint;
  userId: number;
  protocolVersion: number;
  /** Used by `backup` without arguments */
  backupFiles: string[];
  timeoutMs?: number;
  connector?: Connector;
  files?: FileAdapter;
}

export default function App({
  endpoint,
  userId,
  protocolVersion,
  backupFiles,
  timeoutMs,
  connector,
  files,
}: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [state, dispatch] = useReducer(appReducer, createInitialState({ endpoint, userId, protocolVersion }));
  const [input, setInput] = useState("");

  const columns = stdout?.columns ?? 80;

  const client = useMemo(
    () =>
      new BackupClient({
        endpoint,
        userId,
        version: protocolVersion,
        timeoutMs,
        connector,
        files,
        onUpdate: (opState) => dispatch({ type: "OPERATION_UPDATE", state: opState }),
      }),
    [endpoint, userId, protocolVersion, timeoutMs, connector, files],
  );

  const latest = useRef(state);
  latest.current = state;

  const submit = useMemo(
    () =>
      createSubmitHandler({
        run: (request) => client.run(request),
        dispatch,
        exit,
        getState: () => latest.current,
        backupFiles,
      }),
    [client, exit, backupFiles],
  );

  const handleSubmit = useCallback(
    (text: string) => {
      setInput("");
      submit(text);
    },
    [submit],
  );

  return (
    <Box flexDirection="column" width={columns}>
      <Static items={state.history}>
        {(item) => <HistoryView key={item.id} entry={item} />}
      </Static>

      <Box flexDirection="column">
        <StatusBar state={state} />

        {state.errorMessage && (
          <Box marginLeft={1}>
            <Text color="red">⚠ {state.errorMessage}</Text>
          </Box>
        )}

        {state.isBusy && <ProgressArea operation={state.active} />}

        <Box>
          <Text color={state.isBusy ? "yellow" : "green"}>{state.isBusy ? "⏳" : "❯"} </Text>
          <TextInput
            value={input}
            onChange={setInput}
            onSubmit={handleSubmit}
            placeholder={state.isBusy ? "Waiting for the server..." : "Type a command (help for a list)"}
          />
        </Box>
      </Box>
    </Box>
  );
}

// =============================================================================
// Status Bar
// =============================================================================

function StatusBar({ state }: { state: AppState }) {
  const { endpoint, userId, protocolVersion } = state.serverInfo;
  return (
    <Box gap={2}>
      <Text color={state.isBusy ? "yellow" : "green"}>{state.isBusy ? "◌ Busy" : "● Ready"}</Text>
      <Text dimColor>
        {formatEndpoint(endpoint)} · user {userId} · v{protocolVersion}
      </Text>
    </Box>
  );
}

// =============================================================================
// History View (finished entries in <Static>)
// =============================================================================

function HistoryView({ entry }: { entry: HistoryEntry }) {
  if (entry.kind === "command") {
    return (
      <Box marginTop={1}>
        <Text bold color="blue">❯ {entry.lines.join(" ")}</Text>
      </Box>
    );
  }

  const color = entry.kind === "notice" ? undefined : entry.ok ? "green" : "red";
  return (
    <Box flexDirection="column" marginLeft={2}>
      {entry.lines.map((line, i) => (
        <Text key={i} color={i === entry.lines.length - 1 ? color : undefined}>
          {line}
        </Text>
      ))}
    </Box>
  );
}

// =============================================================================
// Progress Area (running operation)
// =============================================================================

function ProgressArea({ operation }: { operation: OperationState | null }) {
  if (!operation) {
    return (
      <Box marginLeft={2}>
        <Text dimColor>Connecting...</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" marginLeft={2}>
      <Text color="yellow">⟳ {formatPhase(operation)}</Text>
      {operation.listing && formatListing(operation.listing).map((line, i) => (
        <Text key={`l-${i}`} dimColor>{line}</Text>
      ))}
      {operation.outcomes.map((outcome, i) => (
        <Text key={`o-${i}`} dimColor={outcome.status === "pending"}>
          {formatOutcome(outcome)}
        </Text>
      ))}
    </Box>
  );
}
