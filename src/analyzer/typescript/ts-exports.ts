import ts from 'typescript';

/** True if the file is an ES module (has an import, export or import.meta) */
export function isModuleFile(sourceFile: ts.SourceFile): boolean {
  return ts.isExternalModule(sourceFile);
}

export function hasExportModifier(node: ts.Node): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some(m => m.kind === ts.SyntaxKind.ExportKeyword) ?? false;
}

/**
 * Collect the local names a file exports through statements rather than
 * modifiers: `export { a, b as c }`, `export default a` and `export = a`.
 * Re-exports from another module (`export { a } from './x'`) name nothing local.
 */
export function collectExportedNames(sourceFile: ts.SourceFile): Set<string> {
  const names = new Set<string>();

  for (const statement of sourceFile.statements) {
    if (ts.isExportDeclaration(statement)) {
      if (statement.moduleSpecifier || !statement.exportClause) continue;
      if (!ts.isNamedExports(statement.exportClause)) continue;
      for (const element of statement.exportClause.elements) {
        names.add((element.propertyName ?? element.name).text);
      }
    }

    if (ts.isExportAssignment(statement) && ts.isIdentifier(statement.expression)) {
      names.add(statement.expression.text);
    }
  }

  return names;
}

/** Names bound by a top-level function, class or variable statement */
export function declaredNames(statement: ts.Statement): string[] {
  if ((ts.isFunctionDeclaration(statement) || ts.isClassDeclaration(statement)) && statement.name) {
    return [statement.name.text];
  }
  if (ts.isVariableStatement(statement)) {
    return statement.declarationList.declarations
      .map(decl => decl.name)
      .filter(ts.isIdentifier)
      .map(id => id.text);
  }
  return [];
}

/**
 * Check whether `name` is part of the public surface of the given source text.
 * Used to re-validate a removal against the file's current content.
 */
export function isNameExported(fileName: string, content: string, name: string): boolean {
  const sourceFile = ts.createSourceFile(fileName, content, ts.ScriptTarget.Latest, false);
  if (!isModuleFile(sourceFile)) {
    return sourceFile.statements.some(statement => declaredNames(statement).includes(name));
  }
  if (collectExportedNames(sourceFile).has(name)) return true;
  return sourceFile.statements.some(
    statement => hasExportModifier(statement) && declaredNames(statement).includes(name)
  );
}
