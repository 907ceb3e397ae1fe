import { emitHarness } from "./harness-emitter.js";
import { toIdentifier } from "./identifiers.js";
import { applyTopologyManifest, type TopologyManifest } from "./topology-manifest.js";
import { TopologyBuilder, type TopologyBuilderOptions } from "./topology-builder.js";

export type GenerateHarnessOptions = TopologyBuilderOptions & {
  strict?: boolean;
};

export function generateHarness(
  manifest: TopologyManifest,
  options: GenerateHarnessOptions = {},
): string {
  const builder = TopologyBuilder.create(manifest.component_under_test, {
    renderTemplate: options.renderTemplate,
  });
  applyTopologyManifest(manifest, builder);
  return emitHarness(builder, { strict: options.strict ?? false });
}

export function defaultHarnessFileName(manifest: Pick<TopologyManifest, "component_under_test">): string {
  return `${toIdentifier(manifest.component_under_test)}_test.rs`;
}
