import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type HarnessTemplateName = "mock-function" | "test-function";

export type HarnessTemplateValues = {
  "mock-function": { functionName: string };
  // connectMessage is a ready-quoted string literal.
  "test-function": { markerVarName: string; marker: string; protocol: string; connectMessage: string };
};

export type HarnessTemplateRenderer = <N extends HarnessTemplateName>(
  name: N,
  values: HarnessTemplateValues[N],
) => string;

// =============================================================================
// PUBLIC API
// =============================================================================

export function renderHarnessTemplate<N extends HarnessTemplateName>(
  name: N,
  values: HarnessTemplateValues[N],
): string {
  const template = loadTemplate(name);

  // strict mode throws on any placeholder without a value.
  try {
    return template(values).trimEnd();
  } catch (err) {
    throw createTemplateRenderError(name, err);
  }
}

export function resolveTemplatesDir(): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates", "harness");
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<HarnessTemplateName, Handlebars.TemplateDelegate>();
const TEMPLATE_ERROR_CODE = USER_FACING_ERROR_CODES.template;
const TEMPLATE_HINT = "Ensure the template exists under templates/harness.";
const TEMPLATE_SYNTAX_HINT = "Check the template syntax for errors.";
const TEMPLATE_RENDER_HINT = "Provide values for all required template placeholders.";

function createTemplateNotFoundError(name: HarnessTemplateName, templatePath: string): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Harness template missing.",
    message: `Harness template "${name}" not found at ${templatePath}.`,
    hint: TEMPLATE_HINT,
  });
}

function createTemplateReadError(
  name: HarnessTemplateName,
  templatePath: string,
  cause: unknown,
): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Harness template unreadable.",
    message: `Failed to read harness template "${name}" at ${templatePath}.`,
    hint: TEMPLATE_HINT,
    cause,
  });
}

function createTemplateCompileError(name: HarnessTemplateName, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Harness template invalid.",
    message: `Harness template "${name}" failed to compile.`,
    hint: TEMPLATE_SYNTAX_HINT,
    cause,
  });
}

function createTemplateRenderError(name: HarnessTemplateName, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Harness template failed to render.",
    message: `Harness template "${name}" could not be rendered.`,
    hint: TEMPLATE_RENDER_HINT,
    cause,
  });
}

function createPackageRootError(startDir: string): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Harness templates unavailable.",
    message: `package.json not found while resolving templates directory from ${startDir}.`,
    hint: "Ensure the package root and templates directory are available.",
  });
}

// Loading is synchronous so the builder stays free of suspension points.
function loadTemplate(name: HarnessTemplateName): Handlebars.TemplateDelegate {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(resolveTemplatesDir(), `${name}.hbs`);
  if (!fse.existsSync(templatePath)) {
    throw createTemplateNotFoundError(name, templatePath);
  }

  let raw: string;
  try {
    raw = fse.readFileSync(templatePath, "utf8");
  } catch (err) {
    throw createTemplateReadError(name, templatePath, err);
  }

  let compiled: Handlebars.TemplateDelegate;
  try {
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw createTemplateCompileError(name, err);
  }

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

// Walk upward until we find the package root so compiled builds resolve templates correctly.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fse.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw createPackageRootError(startDir);
}
