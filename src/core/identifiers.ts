// Naming rules shared by the topology builder and its templates.
// Every identifier the generated harness binds is derived here so the builder
// and the skeleton renderers can never disagree on a name.

const NON_IDENTIFIER_CHARS = /[^A-Za-z0-9_]/g;

export type MarkerNames = {
  marker: string;
  markerVarName: string;
};

export function toIdentifier(name: string): string {
  const replaced = name.trim().replace(NON_IDENTIFIER_CHARS, "_");
  if (replaced.length === 0) return "_";
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}

export function mockFunctionName(componentName: string): string {
  return `${toIdentifier(componentName)}_impl`;
}

export function urlConstantName(componentName: string): string {
  return `${toIdentifier(componentName).toUpperCase()}_URL`;
}

// fuchsia.example.Echo -> EchoMarker / echomarker
export function markerNamesFor(protocol: string): MarkerNames {
  const segments = protocol.trim().split(".");
  const last = segments[segments.length - 1] ?? "";
  const base = toIdentifier(last);
  const marker = `${base.charAt(0).toUpperCase()}${base.slice(1)}Marker`;
  return { marker, markerVarName: marker.toLowerCase() };
}

// fuchsia.example.Echo -> fidl_fuchsia_example::EchoMarker; undefined without a library prefix.
export function markerImportFor(protocol: string): string | undefined {
  const segments = protocol.trim().split(".");
  if (segments.length < 2) return undefined;

  const library = segments.slice(0, -1).map(toIdentifier).join("_");
  return `fidl_${library}::${markerNamesFor(protocol).marker}`;
}

export function quoteLiteral(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
