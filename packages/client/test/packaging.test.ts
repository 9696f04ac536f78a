/**
 * Built-output layout: the compiled CLI must load its sibling packages from their
 * compiled JavaScript, never from .ts sources.
 */

import { existsSync, readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";

const root = new URL("../../../", import.meta.url);

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(new URL(path, root), "utf8"));
}

function field(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof current !== "object" || current === null || !(key in current)) return undefined;
    current = Object.entries(current).find(([k]) => k === key)?.[1];
  }
  return current;
}

describe.each(["protocol", "commands", "client"])("@stowage/%s", (name) => {
  const manifest = readJson(`packages/${name}/package.json`);
  const build = readJson(`packages/${name}/tsconfig.build.json`);

  it("resolves to sources only under the development condition", () => {
    const entry = field(manifest, "exports", ".");
    expect(Object.keys(typeof entry === "object" && entry !== null ? entry : {})).toEqual([
      "development",
      "types",
      "default",
    ]);
    expect(field(entry, "development")).toBe("./src/index.ts");
    expect(field(entry, "types")).toBe("./dist/index.d.ts");
    expect(field(entry, "default")).toBe("./dist/index.js");
    expect(existsSync(new URL(`packages/${name}/src/index.ts`, root))).toBe(true);
  });

  it("compiles src into the dist directory its exports name", () => {
    expect(field(build, "compilerOptions", "rootDir")).toBe("src");
    expect(field(build, "compilerOptions", "outDir")).toBe("dist");
    expect(field(build, "compilerOptions", "declaration")).toBe(true);
    expect(field(build, "compilerOptions", "customConditions")).toEqual([]);
    expect(field(manifest, "scripts", "build")).toBe("tsc -p tsconfig.build.json");
  });
});

describe("stowage bin", () => {
  it("points at the compiled CLI", () => {
    expect(field(readJson("package.json"), "bin", "stowage")).toBe("packages/client/dist/cli.js");
    expect(existsSync(new URL("packages/client/src/cli.ts", root))).toBe(true);
  });
});
