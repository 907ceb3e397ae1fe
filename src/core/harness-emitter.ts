import type { ConsumeOptions, HarnessTopology, TopologyBuilder } from "./topology-builder.js";

export type EmitOptions = ConsumeOptions;

const REALM_PROLOGUE = [
  "pub async fn create_realm() -> Result<RealmInstance, Error> {",
  "    let builder = RealmBuilder::new().await?;",
];

const REALM_EPILOGUE = [
  "",
  "    let instance = builder.build().await?;",
  "    Ok(instance)",
  "}",
];

// Consumes the builder; the returned text is complete before anything reaches a sink.
export function emitHarness(builder: TopologyBuilder, options: EmitOptions = {}): string {
  const topology = builder.consume(options);
  const blocks: string[] = [];

  const imports = renderImports(topology.imports);
  if (imports.length > 0) {
    blocks.push(imports.join("\n"));
  }

  if (topology.constants.length > 0) {
    blocks.push(topology.constants.map((constant) => constant.text).join("\n"));
  }

  blocks.push(renderRealmFunction(topology));

  for (const mock of topology.mocks) {
    blocks.push(mock.text);
  }

  for (const testCase of topology.testCases) {
    blocks.push(testCase.text);
  }

  return `${blocks.join("\n\n")}\n`;
}

export function renderImports(symbols: readonly string[]): string[] {
  // Sort the rendered lines, not the raw symbols, so ordering matches the emitted bytes.
  return Array.from(new Set(symbols.map((symbol) => `use ${symbol};`))).sort();
}

function renderRealmFunction(topology: HarnessTopology): string {
  return [...REALM_PROLOGUE, ...topology.routes.map((route) => route.text), ...REALM_EPILOGUE].join(
    "\n",
  );
}
