import { describe, expect, it } from "vitest";

import { TopologyError } from "./errors.js";
import { defaultHarnessFileName, generateHarness } from "./generator.js";
import { parseTopologyManifest } from "./topology-manifest.js";

const ECHO_MANIFEST = parseTopologyManifest({
  component_under_test: "echo_server",
  components: [
    { name: "echo_server", url: "fuchsia-pkg://fuchsia.com/echo#meta/echo_server.cm" },
    { name: "fake_logger", mock: true, protocol: "fuchsia.logger.LogSink" },
  ],
  routes: [
    { kind: "protocol", name: "fuchsia.logger.LogSink", source: "fake_logger", targets: ["self"] },
    { kind: "protocol", name: "fuchsia.example.Echo", source: "self", targets: ["root"] },
  ],
  test_cases: ["fuchsia.example.Echo"],
});

describe("generateHarness", () => {
  it("emits sorted imports followed by the URL constant", () => {
    const lines = generateHarness(ECHO_MANIFEST).split("\n");

    expect(lines.slice(0, 10)).toEqual([
      "use anyhow::Error;",
      "use fidl_fuchsia_example::EchoMarker;",
      "use fuchsia_component::server::ServiceFs;",
      "use fuchsia_component_test::LocalComponentHandles;",
      "use fuchsia_component_test::{Capability, ChildOptions, RealmBuilder, RealmInstance, Ref, Route};",
      "use futures::StreamExt;",
      "",
      'const ECHO_SERVER_URL: &str = "fuchsia-pkg://fuchsia.com/echo#meta/echo_server.cm";',
      "",
      "pub async fn create_realm() -> Result<RealmInstance, Error> {",
    ]);
  });

  it("places the mock skeleton before the test case", () => {
    const text = generateHarness(ECHO_MANIFEST);

    const mockIndex = text.indexOf("async fn fake_logger_impl(");
    const testIndex = text.indexOf("async fn test_echomarker()");
    expect(mockIndex).toBeGreaterThan(text.indexOf("    Ok(instance)\n}"));
    expect(testIndex).toBeGreaterThan(mockIndex);
    expect(text.endsWith("    // Exercise fuchsia.example.Echo through `echomarker` here.\n}\n")).toBe(
      true,
    );
  });

  it("produces identical text for the same manifest", () => {
    expect(generateHarness(ECHO_MANIFEST)).toBe(generateHarness(ECHO_MANIFEST));
  });

  it("checks references only in strict mode", () => {
    const manifest = parseTopologyManifest({
      component_under_test: "echo_server",
      routes: [{ kind: "protocol", name: "P", source: "ghost", targets: ["self"] }],
    });

    expect(generateHarness(manifest)).toContain(".from(&ghost)");
    expect(() => generateHarness(manifest, { strict: true })).toThrow(TopologyError);
  });
});

describe("defaultHarnessFileName", () => {
  it("derives the file name from the component under test", () => {
    expect(defaultHarnessFileName({ component_under_test: "echo-server" })).toBe(
      "echo_server_test.rs",
    );
  });
});
