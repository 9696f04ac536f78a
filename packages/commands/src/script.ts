/**
 * Session Script
 *
 * The reference client session, as a list of requests: list, back up the first two
 * configured files, list again, restore the first into `tmp`, delete it, then try to
 * restore it again (the server should answer FILE_NOT_FOUND).
 */

import type { OperationRequest } from "./types.js";

/** Local path the scripted restore writes to */
export const SESSION_RESTORE_TARGET = "tmp";

export function buildSessionScript(backupFiles: readonly string[]): OperationRequest[] {
  const [first, second] = backupFiles;
  const script: OperationRequest[] = [{ op: "list" }];

  if (first !== undefined) script.push({ op: "backup", files: [first] });
  if (second !== undefined) script.push({ op: "backup", files: [second] });

  script.push({ op: "list" });

  if (first !== undefined) {
    script.push(
      { op: "restore", files: [first], saveAs: SESSION_RESTORE_TARGET },
      { op: "delete", files: [first] },
      { op: "restore", files: [first] },
    );
  }

  return script;
}
