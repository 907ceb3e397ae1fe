import path from "node:path";

import fse from "fs-extra";
import { describe, expect, it } from "vitest";

import { renderHarnessTemplate, resolveTemplatesDir } from "./templates.js";

describe("resolveTemplatesDir", () => {
  it("points at templates/harness under the package root", () => {
    const dir = resolveTemplatesDir();

    expect(dir.endsWith(path.join("templates", "harness"))).toBe(true);
    expect(fse.existsSync(path.join(dir, "mock-function.hbs"))).toBe(true);
    expect(fse.existsSync(path.join(dir, "test-function.hbs"))).toBe(true);
  });
});

describe("renderHarnessTemplate", () => {
  it("substitutes the mock function name", () => {
    const output = renderHarnessTemplate("mock-function", { functionName: "dep_impl" });

    expect(output.split("\n")[0]).toBe(
      "async fn dep_impl(handles: LocalComponentHandles) -> Result<(), Error> {",
    );
    expect(output.endsWith("}")).toBe(true);
  });

  it("substitutes every test-case placeholder", () => {
    const output = renderHarnessTemplate("test-function", {
      markerVarName: "pingmarker",
      marker: "PingMarker",
      protocol: "fuchsia.example.Ping",
      connectMessage: '"connected to fuchsia.example.Ping"',
    });

    expect(output.split("\n")).toEqual([
      "#[fuchsia::test]",
      "async fn test_pingmarker() {",
      '    let instance = create_realm().await.expect("created testing realm");',
      "    let pingmarker = instance",
      "        .root",
      "        .connect_to_protocol_at_exposed_dir::<PingMarker>()",
      '        .expect("connected to fuchsia.example.Ping");',
      "    // Exercise fuchsia.example.Ping through `pingmarker` here.",
      "}",
    ]);
  });

  it("keeps braces from substituted values as plain text", () => {
    const output = renderHarnessTemplate("test-function", {
      markerVarName: "echomarker",
      marker: "EchoMarker",
      protocol: "fuchsia.{{x}}.Echo",
      connectMessage: '"connected to fuchsia.{{x}}.Echo"',
    });

    expect(output.split("\n").slice(6, 8)).toEqual([
      '        .expect("connected to fuchsia.{{x}}.Echo");',
      "    // Exercise fuchsia.{{x}}.Echo through `echomarker` here.",
    ]);
  });
});
