import ts from 'typescript';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { glob } from 'glob';
import { errorMessage } from '../errors.js';
import type { FileLivenessResult } from '../types.js';

export const DEFAULT_SUPPRESS_MARKERS = ['test', 'routes'];

const SCAN_PATTERN = '**/*.{ts,tsx,js,jsx,mjs,cjs}';

export interface ScanOptions {
  /**
   * Path substrings that suppress unused-function reports. Such files tend to
   * register handlers with a framework instead of calling them directly.
   */
  suppressMarkers?: string[];
}

interface Collected {
  definedFunctions: Set<string>;
  calledFunctions: Set<string>;
  storedVariables: Set<string>;
  loadedVariables: Set<string>;
}

/** Subtrees that only contain types; their identifiers are not variable reads */
const TYPE_ONLY_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.TypeReference,
  ts.SyntaxKind.TypeLiteral,
  ts.SyntaxKind.InterfaceDeclaration,
  ts.SyntaxKind.TypeAliasDeclaration,
  ts.SyntaxKind.ImportType,
  ts.SyntaxKind.ExpressionWithTypeArguments,
]);

type IdentifierRole = 'store' | 'load' | 'ignore';

function isAssignmentTarget(node: ts.Identifier, parent: ts.Node): boolean {
  return (
    ts.isBinaryExpression(parent) &&
    parent.left === node &&
    parent.operatorToken.kind >= ts.SyntaxKind.FirstAssignment &&
    parent.operatorToken.kind <= ts.SyntaxKind.LastAssignment
  );
}

function roleOf(node: ts.Identifier): IdentifierRole {
  const parent = node.parent;

  if (ts.isVariableDeclaration(parent) || ts.isBindingElement(parent)) {
    return parent.name === node ? 'store' : 'ignore';
  }
  if (isAssignmentTarget(node, parent)) return 'store';
  if ((ts.isForOfStatement(parent) || ts.isForInStatement(parent)) && parent.initializer === node) {
    return 'store';
  }

  // `export { local as alias }` reads the local name
  if (ts.isExportSpecifier(parent)) {
    if (parent.parent.parent.moduleSpecifier) return 'ignore';
    return (parent.propertyName ?? parent.name) === node ? 'load' : 'ignore';
  }

  if (ts.isShorthandPropertyAssignment(parent)) return 'load';

  const declarationName =
    (ts.isFunctionDeclaration(parent) ||
      ts.isFunctionExpression(parent) ||
      ts.isClassDeclaration(parent) ||
      ts.isClassExpression(parent) ||
      ts.isMethodDeclaration(parent) ||
      ts.isPropertyDeclaration(parent) ||
      ts.isPropertyAssignment(parent) ||
      ts.isGetAccessorDeclaration(parent) ||
      ts.isSetAccessorDeclaration(parent) ||
      ts.isParameter(parent) ||
      ts.isEnumDeclaration(parent) ||
      ts.isEnumMember(parent) ||
      ts.isModuleDeclaration(parent) ||
      ts.isTypeParameterDeclaration(parent) ||
      ts.isPropertyAccessExpression(parent) ||
      ts.isJsxAttribute(parent)) &&
    parent.name === node;
  if (declarationName) return 'ignore';

  if (
    ts.isImportSpecifier(parent) ||
    ts.isImportClause(parent) ||
    ts.isNamespaceImport(parent) ||
    ts.isImportEqualsDeclaration(parent) ||
    ts.isLabeledStatement(parent) ||
    ts.isBreakOrContinueStatement(parent) ||
    ts.isQualifiedName(parent)
  ) {
    return 'ignore';
  }

  return 'load';
}

function isFunctionInitializer(node: ts.Expression | undefined): boolean {
  return node !== undefined && (ts.isArrowFunction(node) || ts.isFunctionExpression(node));
}

function collect(sourceFile: ts.SourceFile): Collected {
  const collected: Collected = {
    definedFunctions: new Set(),
    calledFunctions: new Set(),
    storedVariables: new Set(),
    loadedVariables: new Set(),
  };

  function visit(node: ts.Node): void {
    if (TYPE_ONLY_KINDS.has(node.kind)) {
      // `class A extends B` still reads B
      if (ts.isExpressionWithTypeArguments(node)) visit(node.expression);
      return;
    }

    if (ts.isFunctionDeclaration(node) && node.name) {
      collected.definedFunctions.add(node.name.text);
    }
    if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name) && isFunctionInitializer(node.initializer)) {
      collected.definedFunctions.add(node.name.text);
    }

    if ((ts.isCallExpression(node) || ts.isNewExpression(node)) && ts.isIdentifier(node.expression)) {
      collected.calledFunctions.add(node.expression.text);
    }
    // <Component /> compiles to a call
    if ((ts.isJsxOpeningElement(node) || ts.isJsxSelfClosingElement(node)) && ts.isIdentifier(node.tagName)) {
      collected.calledFunctions.add(node.tagName.text);
    }

    if (ts.isIdentifier(node)) {
      const role = roleOf(node);
      if (role === 'store') collected.storedVariables.add(node.text);
      if (role === 'load') collected.loadedVariables.add(node.text);
      return;
    }

    ts.forEachChild(node, visit);
  }

  ts.forEachChild(sourceFile, visit);
  return collected;
}

function difference(a: Set<string>, b: Set<string>): string[] {
  return [...a].filter(name => !b.has(name)).sort();
}

/**
 * Approximate unused functions and variables within a single file.
 * References from other files are invisible here, so results are a
 * heuristic signal and never a basis for removal.
 */
export function scanFileLiveness(filePath: string, content: string, options: ScanOptions = {}): FileLivenessResult {
  const markers = options.suppressMarkers ?? DEFAULT_SUPPRESS_MARKERS;
  const suppressed = markers.some(marker => filePath.toLowerCase().includes(marker.toLowerCase()));

  try {
    const sourceFile = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true);
    const collected = collect(sourceFile);

    return {
      filePath,
      unusedFunctions: suppressed ? [] : difference(collected.definedFunctions, collected.calledFunctions),
      unusedVariables: difference(collected.storedVariables, collected.loadedVariables),
      suppressed,
      heuristic: true,
    };
  } catch (err) {
    console.error(`[scan] Error analyzing file ${filePath}: ${errorMessage(err)}`);
    return {
      filePath,
      unusedFunctions: [],
      unusedVariables: [],
      suppressed,
      heuristic: true,
      error: errorMessage(err),
    };
  }
}

/** Scan every JavaScript/TypeScript file of a checkout, keeping files with findings */
export async function scanRepository(root: string, options: ScanOptions = {}): Promise<FileLivenessResult[]> {
  const files = await glob(SCAN_PATTERN, {
    cwd: root,
    nodir: true,
    posix: true,
    dot: false,
    ignore: ['**/node_modules/**', '**/venv/**'],
  });

  const results: FileLivenessResult[] = [];
  for (const file of files.sort()) {
    let content: string;
    try {
      content = await readFile(resolve(root, file), 'utf-8');
    } catch (err) {
      console.error(`[scan] Could not read ${file}: ${errorMessage(err)}`);
      continue;
    }
    const result = scanFileLiveness(file, content, options);
    if (result.unusedFunctions.length > 0 || result.unusedVariables.length > 0) {
      results.push(result);
    }
  }
  return results;
}
