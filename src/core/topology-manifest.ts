import fse from "fs-extra";
import { z, type ZodIssue } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { markerImportFor } from "./identifiers.js";
import type { TopologyBuilder } from "./topology-builder.js";

// =============================================================================
// SCHEMA
// =============================================================================

const NameSchema = z.string().trim().min(1);

export const ComponentSchema = z
  .object({
    name: NameSchema,
    url: z.string().trim().min(1).optional(),
    mock: z.boolean().default(false),
    protocol: NameSchema.optional(),
  })
  .strict();

export const ProtocolRouteSchema = z
  .object({
    kind: z.literal("protocol"),
    name: NameSchema,
    source: NameSchema,
    targets: z.array(NameSchema).min(1),
  })
  .strict();

export const DirectoryRouteSchema = z
  .object({
    kind: z.literal("directory"),
    name: NameSchema,
    path: NameSchema,
    targets: z.array(NameSchema).min(1),
  })
  .strict();

export const StorageRouteSchema = z
  .object({
    kind: z.literal("storage"),
    name: NameSchema,
    path: NameSchema,
    targets: z.array(NameSchema).min(1),
  })
  .strict();

export const RouteSchema = z.discriminatedUnion("kind", [
  ProtocolRouteSchema,
  DirectoryRouteSchema,
  StorageRouteSchema,
]);

export const TopologyManifestSchema = z
  .object({
    component_under_test: NameSchema,
    imports: z.array(NameSchema).default([]),
    components: z.array(ComponentSchema).default([]),
    routes: z.array(RouteSchema).default([]),
    test_cases: z.array(NameSchema).default([]),
  })
  .strict();

export type TopologyManifest = z.infer<typeof TopologyManifestSchema>;
export type ManifestComponent = z.infer<typeof ComponentSchema>;
export type ManifestRoute = z.infer<typeof RouteSchema>;

export const DEFAULT_HARNESS_IMPORTS = [
  "anyhow::Error",
  "fuchsia_component_test::{Capability, ChildOptions, RealmBuilder, RealmInstance, Ref, Route}",
];

export const MOCK_HARNESS_IMPORTS = [
  "fuchsia_component::server::ServiceFs",
  "fuchsia_component_test::LocalComponentHandles",
  "futures::StreamExt",
];

export const DIRECTORY_HARNESS_IMPORT = "fidl_fuchsia_io as fio";

// =============================================================================
// PARSING
// =============================================================================

const MANIFEST_HINT = "Fix the topology manifest fields listed above.";

export function formatManifestIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_union_discriminator") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

export function parseTopologyManifest(value: unknown, source = "manifest"): TopologyManifest {
  const parsed = TopologyManifestSchema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const lines = formatManifestIssues(parsed.error.issues);
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.manifest,
    title: "Topology manifest invalid.",
    message: [`${source} failed validation:`, ...lines.map((line) => `- ${line}`)].join("\n"),
    hint: MANIFEST_HINT,
    cause: parsed.error,
  });
}

export async function loadTopologyManifest(manifestPath: string): Promise<TopologyManifest> {
  let raw: string;
  try {
    raw = await fse.readFile(manifestPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.manifest,
      title: "Topology manifest unreadable.",
      message: `Failed to read topology manifest at ${manifestPath}.`,
      hint: "Check that the manifest path exists and is readable.",
      cause: err,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.manifest,
      title: "Topology manifest is not valid JSON.",
      message: `Failed to parse topology manifest at ${manifestPath}.`,
      hint: MANIFEST_HINT,
      cause: err,
    });
  }

  return parseTopologyManifest(json, manifestPath);
}

// =============================================================================
// APPLY
// =============================================================================

// Feeds the manifest into the builder in document order.
export function applyTopologyManifest(
  manifest: TopologyManifest,
  builder: TopologyBuilder,
): TopologyBuilder {
  for (const symbol of collectImports(manifest)) {
    builder.addImport(symbol);
  }

  for (const component of manifest.components) {
    builder.addComponent(component.name, component.url, component.mock);
  }

  for (const component of manifest.components) {
    if (component.mock) {
      builder.addMockImpl(component.name, component.protocol);
    }
  }

  for (const route of manifest.routes) {
    applyRoute(builder, route);
  }

  for (const protocol of manifest.test_cases) {
    builder.addTestCase(protocol);
  }

  return builder;
}

function applyRoute(builder: TopologyBuilder, route: ManifestRoute): void {
  switch (route.kind) {
    case "protocol":
      builder.addProtocol(route.name, route.source, route.targets);
      return;
    case "directory":
      builder.addDirectory(route.name, route.path, route.targets);
      return;
    case "storage":
      builder.addStorage(route.name, route.path, route.targets);
      return;
  }
}

function collectImports(manifest: TopologyManifest): string[] {
  const imports = [...DEFAULT_HARNESS_IMPORTS, ...manifest.imports];

  if (manifest.components.some((component) => component.mock)) {
    imports.push(...MOCK_HARNESS_IMPORTS);
  }
  if (manifest.routes.some((route) => route.kind === "directory")) {
    imports.push(DIRECTORY_HARNESS_IMPORT);
  }
  for (const protocol of manifest.test_cases) {
    const markerImport = markerImportFor(protocol);
    if (markerImport) imports.push(markerImport);
  }

  return imports;
}
