/**
 * Topology builder.
 * Purpose: accumulate one test realm (components, capability routes, mock and test skeletons)
 * as pre-rendered harness fragments, ready for emitHarness.
 * Assumptions: one builder per generated file; callers supply facts in discovery order.
 * Usage: new TopologyBuilder("echo_server").addComponent(...).addProtocol(...).consume().
 */

import { BuilderStateError, TopologyError } from "./errors.js";
import {
  markerNamesFor,
  mockFunctionName,
  quoteLiteral,
  toIdentifier,
  urlConstantName,
} from "./identifiers.js";
import { renderHarnessTemplate, type HarnessTemplateRenderer } from "./templates.js";

// =============================================================================
// TYPES
// =============================================================================

export const ROOT_ENDPOINT = "root";
export const SELF_ENDPOINT = "self";

// "root", "self", or any component name.
export type RouteEndpoint = typeof ROOT_ENDPOINT | typeof SELF_ENDPOINT | (string & {});

export type ComponentRef = {
  readonly name: string;
  readonly url?: string;
  readonly isMock: boolean;
  readonly variable: string;
  readonly mockFunction?: string;
};

export type RouteKind = "child" | "local-child" | "protocol" | "directory" | "storage";

export type RouteSnippet = {
  readonly kind: RouteKind;
  readonly text: string;
  // Component names mentioned by the snippet, excluding root/self.
  readonly references: readonly string[];
};

export type MockSkeleton = {
  readonly componentName: string;
  readonly functionName: string;
  readonly protocol?: string;
  readonly text: string;
};

export type TestCaseSnippet = {
  readonly protocol: string;
  readonly functionName: string;
  readonly text: string;
};

export type ConstantDecl = {
  readonly name: string;
  readonly componentName: string;
  readonly text: string;
};

export type HarnessTopology = {
  readonly componentUnderTest: string;
  readonly imports: readonly string[];
  readonly components: readonly ComponentRef[];
  readonly constants: readonly ConstantDecl[];
  readonly routes: readonly RouteSnippet[];
  readonly mocks: readonly MockSkeleton[];
  readonly testCases: readonly TestCaseSnippet[];
};

export type TopologyBuilderOptions = {
  renderTemplate?: HarnessTemplateRenderer;
};

export type ConsumeOptions = {
  // Resolve and check every cross reference before handing the topology over.
  strict?: boolean;
};

// =============================================================================
// BUILDER
// =============================================================================

const TARGET_INDENT = " ".repeat(16);
const DIRECTORY_RIGHTS = "fio::RW_STAR_DIR";

export class TopologyBuilder {
  readonly componentUnderTest: string;

  private readonly imports = new Set<string>();
  private readonly components: ComponentRef[] = [];
  private readonly constants: ConstantDecl[] = [];
  private readonly routes: RouteSnippet[] = [];
  private readonly mocks: MockSkeleton[] = [];
  private readonly testCases: TestCaseSnippet[] = [];
  private readonly renderTemplate: HarnessTemplateRenderer;
  private consumed = false;

  constructor(componentUnderTest: string, options: TopologyBuilderOptions = {}) {
    this.componentUnderTest = componentUnderTest;
    this.renderTemplate = options.renderTemplate ?? renderHarnessTemplate;
  }

  static create(componentUnderTest: string, options?: TopologyBuilderOptions): TopologyBuilder {
    return new TopologyBuilder(componentUnderTest, options);
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  addImport(symbol: string): this {
    this.assertOpen("addImport");
    this.imports.add(symbol);
    return this;
  }

  addComponent(name: string, url: string | undefined, isMock: boolean): this {
    this.assertOpen("addComponent");
    const variable = toIdentifier(name);

    if (isMock) {
      const mockFunction = mockFunctionName(name);
      this.components.push({ name, url, isMock, variable, mockFunction });
      this.routes.push({
        kind: "local-child",
        references: [],
        text: [
          `    let ${variable} = builder.add_local_child(`,
          `        ${quoteLiteral(name)},`,
          `        move |handles: LocalComponentHandles| Box::pin(${mockFunction}(handles)),`,
          "        ChildOptions::new()",
          "    )",
          "    .await?;",
        ].join("\n"),
      });
      return this;
    }

    if (url === undefined || url.trim().length === 0) {
      throw new TopologyError(`Component "${name}" is not a mock and has no URL.`);
    }

    const constant = urlConstantName(name);
    this.components.push({ name, url, isMock, variable });
    this.constants.push({
      name: constant,
      componentName: name,
      text: `const ${constant}: &str = ${quoteLiteral(url)};`,
    });
    this.routes.push({
      kind: "child",
      references: [],
      text: [
        `    let ${variable} = builder.add_child(`,
        `        ${quoteLiteral(name)},`,
        `        ${constant},`,
        "        ChildOptions::new()",
        "    )",
        "    .await?;",
      ].join("\n"),
    });
    return this;
  }

  addMockImpl(componentName: string, protocol?: string): this {
    this.assertOpen("addMockImpl");
    // Reuse the name stored by addComponent so the route and skeleton stay linked.
    const component = this.components.find((entry) => entry.name === componentName);
    const functionName = component?.mockFunction ?? mockFunctionName(componentName);

    this.mocks.push({
      componentName,
      functionName,
      protocol,
      text: this.renderTemplate("mock-function", { functionName }),
    });
    return this;
  }

  addProtocol(protocol: string, source: RouteEndpoint, targets: readonly RouteEndpoint[]): this {
    this.assertOpen("addProtocol");
    this.pushRoute(
      "protocol",
      `Capability::protocol_by_name(${quoteLiteral(protocol)})`,
      source,
      targets,
      `protocol "${protocol}"`,
    );
    return this;
  }

  addDirectory(name: string, path: string, targets: readonly RouteEndpoint[]): this {
    this.assertOpen("addDirectory");
    this.pushRoute(
      "directory",
      `Capability::directory(${quoteLiteral(name)}).path(${quoteLiteral(path)}).rights(${DIRECTORY_RIGHTS})`,
      ROOT_ENDPOINT,
      targets,
      `directory "${name}"`,
    );
    return this;
  }

  addStorage(name: string, path: string, targets: readonly RouteEndpoint[]): this {
    this.assertOpen("addStorage");
    this.pushRoute(
      "storage",
      `Capability::storage(${quoteLiteral(name)}).path(${quoteLiteral(path)})`,
      ROOT_ENDPOINT,
      targets,
      `storage "${name}"`,
    );
    return this;
  }

  addTestCase(protocol: string): this {
    this.assertOpen("addTestCase");
    const { marker, markerVarName } = markerNamesFor(protocol);
    const connectMessage = quoteLiteral(`connected to ${protocol}`);
    this.testCases.push({
      protocol,
      functionName: `test_${markerVarName}`,
      text: this.renderTemplate("test-function", { markerVarName, marker, protocol, connectMessage }),
    });
    return this;
  }

  consume(options: ConsumeOptions = {}): HarnessTopology {
    this.assertOpen("consume");

    if (options.strict) {
      const issues = [
        ...collectReferenceIssues(this.componentUnderTest, this.components, this.routes, this.mocks),
        ...collectNameClashes(this.components, this.constants, this.mocks, this.testCases),
      ];
      if (issues.length > 0) {
        throw new TopologyError(
          `Topology has ${issues.length} unresolved reference issue(s).`,
          issues,
        );
      }
    }

    this.consumed = true;
    return {
      componentUnderTest: this.componentUnderTest,
      imports: Array.from(this.imports),
      components: [...this.components],
      constants: [...this.constants],
      routes: [...this.routes],
      mocks: [...this.mocks],
      testCases: [...this.testCases],
    };
  }

  // ---------------------------------------------------------------------------

  private assertOpen(operation: string): void {
    if (this.consumed) {
      throw new BuilderStateError(
        `${operation}() called on a consumed topology builder for "${this.componentUnderTest}".`,
      );
    }
  }

  private pushRoute(
    kind: RouteKind,
    capability: string,
    source: RouteEndpoint,
    targets: readonly RouteEndpoint[],
    label: string,
  ): void {
    if (targets.length === 0) {
      throw new TopologyError(`Route for ${label} has no targets.`);
    }

    const references = [source, ...targets].filter(
      (endpoint) => endpoint !== ROOT_ENDPOINT && endpoint !== SELF_ENDPOINT,
    );
    const toLines = targets.map((target) => `${TARGET_INDENT}.to(${this.resolveEndpoint(target)})`);

    this.routes.push({
      kind,
      references: Array.from(new Set(references)),
      text: [
        "    builder",
        "        .add_route(",
        "            Route::new()",
        `                .capability(${capability})`,
        `                .from(${this.resolveEndpoint(source)})`,
        `${toLines.join("\n")},`,
        "        )",
        "        .await?;",
      ].join("\n"),
    });
  }

  private resolveEndpoint(endpoint: RouteEndpoint): string {
    if (endpoint === ROOT_ENDPOINT) return "Ref::parent()";
    if (endpoint === SELF_ENDPOINT) return `&${toIdentifier(this.componentUnderTest)}`;
    return `&${toIdentifier(endpoint)}`;
  }
}

// =============================================================================
// STRICT VALIDATION
// =============================================================================

function collectReferenceIssues(
  componentUnderTest: string,
  components: readonly ComponentRef[],
  routes: readonly RouteSnippet[],
  mocks: readonly MockSkeleton[],
): string[] {
  const issues: string[] = [];
  const byName = new Map<string, ComponentRef>();

  for (const component of components) {
    if (byName.has(component.name)) {
      issues.push(`Component "${component.name}" is declared more than once.`);
      continue;
    }
    byName.set(component.name, component);
  }

  const reported = new Set<string>();
  for (const route of routes) {
    for (const name of route.references) {
      if (name === componentUnderTest || byName.has(name) || reported.has(name)) continue;
      reported.add(name);
      issues.push(`Route references unknown component "${name}".`);
    }
  }

  const skeletons = new Set(mocks.map((mock) => mock.functionName));
  for (const component of components) {
    if (component.mockFunction && !skeletons.has(component.mockFunction)) {
      issues.push(
        `Mock component "${component.name}" has no ${component.mockFunction} implementation.`,
      );
    }
  }

  for (const mock of mocks) {
    const component = byName.get(mock.componentName);
    if (!component) {
      issues.push(`Mock implementation targets unknown component "${mock.componentName}".`);
    } else if (!component.isMock) {
      issues.push(`Mock implementation targets non-mock component "${mock.componentName}".`);
    }
  }

  return issues;
}

// Distinct inputs can derive the same generated name; each clash would be a
// duplicate definition in the harness.
function collectNameClashes(
  components: readonly ComponentRef[],
  constants: readonly ConstantDecl[],
  mocks: readonly MockSkeleton[],
  testCases: readonly TestCaseSnippet[],
): string[] {
  const issues: string[] = [];

  const variables = new Map<string, string>();
  for (const component of components) {
    const owner = variables.get(component.variable);
    if (owner === undefined) {
      variables.set(component.variable, component.name);
    } else if (owner !== component.name) {
      issues.push(
        `Components "${owner}" and "${component.name}" both bind \`${component.variable}\`.`,
      );
    }
  }

  const constantOwners = new Map<string, string>();
  for (const constant of constants) {
    const owner = constantOwners.get(constant.name);
    if (owner === undefined) {
      constantOwners.set(constant.name, constant.componentName);
    } else if (owner !== constant.componentName) {
      issues.push(
        `Components "${owner}" and "${constant.componentName}" both declare ${constant.name}.`,
      );
    }
  }

  const mockFunctions = new Set<string>();
  for (const mock of mocks) {
    if (mockFunctions.has(mock.functionName)) {
      issues.push(`Mock implementation ${mock.functionName} is declared more than once.`);
      continue;
    }
    mockFunctions.add(mock.functionName);
  }

  const testOwners = new Map<string, string>();
  for (const testCase of testCases) {
    const owner = testOwners.get(testCase.functionName);
    if (owner === undefined) {
      testOwners.set(testCase.functionName, testCase.protocol);
    } else if (owner === testCase.protocol) {
      issues.push(`Test case for "${testCase.protocol}" is declared more than once.`);
    } else {
      issues.push(
        `Test cases for "${owner}" and "${testCase.protocol}" both emit ${testCase.functionName}.`,
      );
    }
  }

  return issues;
}
