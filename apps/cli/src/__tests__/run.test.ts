import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { DiagnosticError } from "@apiref/metadata";
import type { DocumentationLogger } from "@apiref/docgen";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ApirefConfig } from "../config/types.js";
import { formatRunSummary, resolveDocumentationPath, runApiref } from "../run.js";

const manifest = {
  assembly: {
    name: "Sample",
    version: "1.0.0.0",
    targetFramework: { name: ".NETStandard,Version=v2.0" },
  },
  types: [
    {
      namespace: "Sample",
      name: "Widget",
      kind: "class",
      members: [
        {
          kind: "method",
          name: "Create",
          isStatic: true,
          parameters: [{ name: "count", type: "System.Int32" }],
          returnType: "Sample.Widget",
        },
      ],
    },
  ],
};

const docs = `<?xml version="1.0"?>
<doc>
  <assembly><name>Sample</name></assembly>
  <members>
    <member name="M:Sample.Widget.Create(System.Int32)">
      <summary>Creates a widget.</summary>
    </member>
  </members>
</doc>`;

const recordingLogger = (messages: string[]): DocumentationLogger => ({
  info: () => {},
  debug: () => {},
  warn: (message) => messages.push(message),
});

describe("runApiref", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "apiref-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const configFor = (overrides: Partial<ApirefConfig> = {}): ApirefConfig => ({
    manifests: [join(dir, "Sample.json")],
    format: "markdown",
    out: join(dir, "out"),
    verbose: false,
    ...overrides,
  });

  it("writes documents for a manifest and its sibling xml file", () => {
    writeFileSync(join(dir, "Sample.json"), JSON.stringify(manifest));
    writeFileSync(join(dir, "Sample.xml"), docs);

    const [result] = runApiref(configFor());

    const root = join(dir, "out", "Sample");
    expect(result).toEqual({
      assembly: "Sample",
      root,
      files: [`${root}/Sample.Widget.md`, `${root}/Sample.Widget.Create.md`],
    });
    expect(readFileSync(`${root}/Sample.Widget.Create.md`, "utf8")).toContain(
      "Creates a widget.",
    );
    expect(formatRunSummary(result)).toBe(
      `Sample: 2 document(s) written to ${root}`,
    );
  });

  it("warns and still generates when no documentation file exists", () => {
    writeFileSync(join(dir, "Sample.json"), JSON.stringify(manifest));
    const warnings: string[] = [];

    const [result] = runApiref(configFor({ format: "html" }), {
      logger: recordingLogger(warnings),
    });

    expect(warnings).toEqual(["no documentation file found; documents will have no prose"]);
    expect(result.files).toEqual([
      join(dir, "out", "Sample", "Sample.Widget.html"),
      join(dir, "out", "Sample", "Sample.Widget.Create.html"),
    ]);
  });

  it("documents the bundled example library", () => {
    const example = fileURLToPath(new URL("../../examples/Sample.json", import.meta.url));

    const [result] = runApiref(configFor({ manifests: [example] }));

    const member = readFileSync(`${result.root}/Sample.Widget.Create.md`, "utf8");
    expect(member).toContain("Creates a `Widget` .\n");
  });

  it("raises MF0001 for a missing manifest", () => {
    let code: string | undefined;
    try {
      runApiref(configFor());
    } catch (error) {
      if (!(error instanceof DiagnosticError)) throw error;
      code = error.diagnostic.code;
    }
    expect(code).toBe("MF0001");
  });
});

describe("resolveDocumentationPath", () => {
  it("prefers an explicit override", () => {
    expect(
      resolveDocumentationPath({
        manifestPath: "/libs/Sample.json",
        documentationFile: "Sample.xml",
        override: "/docs/Other.xml",
      }),
    ).toBe("/docs/Other.xml");
  });

  it("resolves the manifest's documentation file beside the manifest", () => {
    expect(
      resolveDocumentationPath({
        manifestPath: "/libs/Sample.json",
        documentationFile: "docs/Sample.xml",
      }),
    ).toBe("/libs/docs/Sample.xml");
  });

  it("returns undefined when no sibling xml file exists", () => {
    expect(
      resolveDocumentationPath({ manifestPath: join(tmpdir(), "apiref-missing", "Lib.json") }),
    ).toBeUndefined();
  });
});
