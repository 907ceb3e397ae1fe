import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { HarnessTemplateRenderer } from "./templates.js";
import { TopologyBuilder } from "./topology-builder.js";
import {
  applyTopologyManifest,
  loadTopologyManifest,
  parseTopologyManifest,
} from "./topology-manifest.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

const fakeRenderer: HarnessTemplateRenderer = (name) => name;

// =============================================================================
// TESTS
// =============================================================================

describe("parseTopologyManifest", () => {
  it("applies defaults for optional sections", () => {
    const manifest = parseTopologyManifest({ component_under_test: "echo_server" });

    expect(manifest).toEqual({
      component_under_test: "echo_server",
      imports: [],
      components: [],
      routes: [],
      test_cases: [],
    });
  });

  it("lists every validation issue with its location", () => {
    let caught: unknown;
    try {
      parseTopologyManifest(
        {
          component_under_test: "echo_server",
          components: [{ name: "dep", mock: "yes" }],
          routes: [{ kind: "service", name: "x" }],
          extra: true,
        },
        "realm.json",
      );
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UserFacingError);
    const error = caught as UserFacingError;
    expect(error.code).toBe(USER_FACING_ERROR_CODES.manifest);
    expect(error.message.split("\n")).toEqual([
      "realm.json failed validation:",
      "- components.0.mock: Expected boolean, received string",
      '- routes.0.kind: Expected one of "protocol", "directory", "storage"',
      "- <root>: Unrecognized keys: extra",
    ]);
  });
});

describe("loadTopologyManifest", () => {
  it("reads and validates a manifest file", async () => {
    const dir = makeTempDir("testgen-manifest-");
    const manifestPath = path.join(dir, "realm.json");
    fs.writeFileSync(
      manifestPath,
      JSON.stringify({ component_under_test: "echo_server", test_cases: ["fuchsia.example.Echo"] }),
    );

    const manifest = await loadTopologyManifest(manifestPath);

    expect(manifest.test_cases).toEqual(["fuchsia.example.Echo"]);
  });

  it("reports invalid JSON as a manifest error", async () => {
    const dir = makeTempDir("testgen-manifest-");
    const manifestPath = path.join(dir, "realm.json");
    fs.writeFileSync(manifestPath, "{ not json");

    await expect(loadTopologyManifest(manifestPath)).rejects.toMatchObject({
      code: USER_FACING_ERROR_CODES.manifest,
      title: "Topology manifest is not valid JSON.",
    });
  });

  it("reports a missing file as unreadable", async () => {
    const dir = makeTempDir("testgen-manifest-");

    await expect(loadTopologyManifest(path.join(dir, "missing.json"))).rejects.toMatchObject({
      title: "Topology manifest unreadable.",
    });
  });
});

describe("applyTopologyManifest", () => {
  it("feeds components, mocks, routes, and test cases in document order", () => {
    const manifest = parseTopologyManifest({
      component_under_test: "echo_server",
      imports: ["extra::Helper"],
      components: [
        { name: "echo_server", url: "fuchsia-pkg://echo#meta/echo_server.cm" },
        { name: "fake_logger", mock: true, protocol: "fuchsia.logger.LogSink" },
      ],
      routes: [
        { kind: "protocol", name: "fuchsia.logger.LogSink", source: "fake_logger", targets: ["self"] },
        { kind: "directory", name: "config-data", path: "/config", targets: ["self"] },
        { kind: "storage", name: "data", path: "/data", targets: ["self"] },
      ],
      test_cases: ["fuchsia.example.Echo"],
    });

    const builder = TopologyBuilder.create("echo_server", { renderTemplate: fakeRenderer });
    const topology = applyTopologyManifest(manifest, builder).consume({ strict: true });

    expect(topology.routes.map((route) => route.kind)).toEqual([
      "child",
      "local-child",
      "protocol",
      "directory",
      "storage",
    ]);
    expect(topology.mocks.map((mock) => [mock.functionName, mock.protocol])).toEqual([
      ["fake_logger_impl", "fuchsia.logger.LogSink"],
    ]);
    expect(topology.testCases.map((testCase) => testCase.protocol)).toEqual([
      "fuchsia.example.Echo",
    ]);
    expect([...topology.imports].sort()).toEqual([
      "anyhow::Error",
      "extra::Helper",
      "fidl_fuchsia_example::EchoMarker",
      "fidl_fuchsia_io as fio",
      "fuchsia_component::server::ServiceFs",
      "fuchsia_component_test::LocalComponentHandles",
      "fuchsia_component_test::{Capability, ChildOptions, RealmBuilder, RealmInstance, Ref, Route}",
      "futures::StreamExt",
    ]);
  });

  it("surfaces a component without URL as a topology error", () => {
    const manifest = parseTopologyManifest({
      component_under_test: "echo_server",
      components: [{ name: "dep" }],
    });

    expect(() => applyTopologyManifest(manifest, TopologyBuilder.create("echo_server"))).toThrow(
      'Component "dep" is not a mock and has no URL.',
    );
  });
});
