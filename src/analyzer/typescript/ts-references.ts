import ts from 'typescript';
import type { UsageSite } from '../types.js';

/** A definition being tracked while references are resolved */
export interface TrackedDefinition {
  nameNode: ts.Identifier;
  /** Project-relative path of the declaring file */
  filepath: string;
  start: number;
  end: number;
  usages: UsageSite[];
}

/** A parsed file whose identifiers are scanned for references */
export interface ScannedFile {
  sourceFile: ts.SourceFile;
  filepath: string;
}

function usageSite(node: ts.Identifier, file: ScannedFile): UsageSite {
  const { line, character } = file.sourceFile.getLineAndCharacterOfPosition(node.getStart(file.sourceFile));
  return { filepath: file.filepath, line: line + 1, column: character + 1 };
}

/** References inside the definition's own range (recursion) do not keep it alive */
function isSelfReference(node: ts.Identifier, file: ScannedFile, target: TrackedDefinition): boolean {
  if (node === target.nameNode) return true;
  if (file.filepath !== target.filepath) return false;
  const pos = node.getStart(file.sourceFile);
  return pos >= target.start && pos < target.end;
}

function forEachIdentifier(sourceFile: ts.SourceFile, callback: (node: ts.Identifier) => void): void {
  function visit(node: ts.Node): void {
    if (ts.isIdentifier(node)) {
      callback(node);
      return;
    }
    ts.forEachChild(node, visit);
  }
  ts.forEachChild(sourceFile, visit);
}

/** Resolve the symbol an identifier refers to, following import aliases */
function resolveSymbol(node: ts.Identifier, checker: ts.TypeChecker): ts.Symbol | undefined {
  let symbol = ts.isShorthandPropertyAssignment(node.parent) && node.parent.name === node
    ? checker.getShorthandAssignmentValueSymbol(node.parent)
    : checker.getSymbolAtLocation(node);
  if (!symbol) return undefined;

  if (symbol.flags & ts.SymbolFlags.Alias) {
    symbol = checker.getAliasedSymbol(symbol);
  }
  return symbol;
}

/**
 * Record usages through the type checker. Shadowed names and unrelated
 * symbols that share a name are not counted.
 */
export function resolveUsagesWithChecker(
  files: ScannedFile[],
  tracked: TrackedDefinition[],
  checker: ts.TypeChecker
): void {
  const bySymbol = new Map<ts.Symbol, TrackedDefinition>();
  for (const definition of tracked) {
    const symbol = checker.getSymbolAtLocation(definition.nameNode);
    if (symbol) bySymbol.set(symbol, definition);
  }

  for (const file of files) {
    forEachIdentifier(file.sourceFile, node => {
      const symbol = resolveSymbol(node, checker);
      if (!symbol) return;
      const target = bySymbol.get(symbol);
      if (!target || isSelfReference(node, file, target)) return;
      target.usages.push(usageSite(node, file));
    });
  }
}

/**
 * Record usages by identifier text alone. Every identifier that spells a
 * tracked name counts, including property names, so usages are over- rather
 * than under-approximated.
 */
export function resolveUsagesByName(files: ScannedFile[], tracked: TrackedDefinition[]): void {
  const byName = new Map<string, TrackedDefinition[]>();
  for (const definition of tracked) {
    const list = byName.get(definition.nameNode.text) || [];
    list.push(definition);
    byName.set(definition.nameNode.text, list);
  }

  for (const file of files) {
    forEachIdentifier(file.sourceFile, node => {
      const targets = byName.get(node.text);
      if (!targets) return;
      for (const target of targets) {
        if (!isSelfReference(node, file, target)) {
          target.usages.push(usageSite(node, file));
        }
      }
    });
  }
}
