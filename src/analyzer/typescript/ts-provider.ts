import ts from 'typescript';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { BaseSourceModelProvider, type DiscoveredFile } from '../base-provider.js';
import { LoadError, errorMessage } from '../errors.js';
import { collectExportedNames, hasExportModifier, isModuleFile } from './ts-exports.js';
import {
  resolveUsagesByName,
  resolveUsagesWithChecker,
  type ScannedFile,
  type TrackedDefinition,
} from './ts-references.js';
import type {
  Definition,
  DefinitionKind,
  Snapshot,
  SourceFile,
  SourceModelOptions,
} from '../types.js';

interface ExtractedDefinition extends TrackedDefinition {
  name: string;
  kind: DefinitionKind;
  line: number;
  isExported: boolean;
  /** Overload signatures merge into the following declaration */
  isOverload: boolean;
}

class TypeScriptSnapshot implements Snapshot {
  constructor(
    readonly root: string,
    private readonly sourceFiles: SourceFile[]
  ) {}

  files(): SourceFile[] {
    return this.sourceFiles;
  }
}

/**
 * Source model provider for TypeScript and JavaScript projects, built on the
 * compiler API. With type resolution on, references are resolved through a
 * full program's type checker; with it off, each file is parsed on its own and
 * references are matched by name.
 */
export class TypeScriptSourceModelProvider extends BaseSourceModelProvider {
  async load(locator: string, options: SourceModelOptions): Promise<Snapshot> {
    const root = this.resolveRoot(locator);
    const discovered = await this.resolveFiles(root, options);

    try {
      return this.buildSnapshot(root, discovered, options);
    } catch (err) {
      throw new LoadError(`Failed to build snapshot: ${errorMessage(err)}`, { cause: err });
    }
  }

  private buildSnapshot(root: string, discovered: DiscoveredFile[], options: SourceModelOptions): Snapshot {
    const scanned: ScannedFile[] = [];
    let checker: ts.TypeChecker | undefined;

    if (options.resolveTypes) {
      const program = this.createProgram(root, discovered.map(f => f.absolutePath), options.tsconfig);
      checker = program.getTypeChecker();
      for (const file of discovered) {
        const sourceFile = program.getSourceFile(file.absolutePath);
        if (sourceFile) scanned.push({ sourceFile, filepath: file.relativePath });
      }
    } else {
      for (const file of discovered) {
        // Offsets exclude a byte order mark, matching the compiler host
        const content = readFileSync(file.absolutePath, 'utf-8').replace(/^\uFEFF/, '');
        const sourceFile = ts.createSourceFile(
          file.absolutePath,
          content,
          ts.ScriptTarget.Latest,
          true,
          scriptKindFor(file.absolutePath)
        );
        scanned.push({ sourceFile, filepath: file.relativePath });
      }
    }

    const extracted = new Map<ScannedFile, ExtractedDefinition[]>();
    for (const file of scanned) {
      extracted.set(file, this.extractDefinitions(file, options.parseComments));
    }

    const tracked = [...extracted.values()].flat();
    if (checker) {
      resolveUsagesWithChecker(scanned, tracked, checker);
    } else {
      resolveUsagesByName(scanned, tracked);
    }

    const sourceFiles: SourceFile[] = scanned.map(file => ({
      path: file.filepath,
      absolutePath: file.sourceFile.fileName,
      definitions: (extracted.get(file) || []).map(toDefinition(file.sourceFile)),
    }));

    console.log(
      `[load] ${sourceFiles.length} files, ${tracked.length} definitions` +
        (options.resolveTypes ? '' : ' (name-based references)')
    );
    return new TypeScriptSnapshot(root, sourceFiles);
  }

  private resolveTsConfig(root: string, tsconfig?: string): string | undefined {
    if (tsconfig) {
      return resolve(root, tsconfig);
    }
    const defaultPath = resolve(root, 'tsconfig.json');
    return existsSync(defaultPath) ? defaultPath : undefined;
  }

  private createProgram(root: string, files: string[], tsconfig?: string): ts.Program {
    let compilerOptions: ts.CompilerOptions = {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.Node16,
      moduleResolution: ts.ModuleResolutionKind.Node16,
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      noEmit: true,
      skipLibCheck: true,
      types: [],
    };

    const tsconfigPath = this.resolveTsConfig(root, tsconfig);
    if (tsconfigPath && existsSync(tsconfigPath)) {
      const configFile = ts.readConfigFile(tsconfigPath, ts.sys.readFile);
      if (configFile.config) {
        const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, root);
        compilerOptions = { ...parsed.options, allowJs: true, noEmit: true, skipLibCheck: true, types: [] };
      }
    }

    return ts.createProgram(files, compilerOptions);
  }

  /** Extract top-level functions and classes in declaration order */
  private extractDefinitions(file: ScannedFile, parseComments: boolean): ExtractedDefinition[] {
    const { sourceFile } = file;
    const definitions: ExtractedDefinition[] = [];
    const isModule = isModuleFile(sourceFile);
    const exportedNames = isModule ? collectExportedNames(sourceFile) : new Set<string>();

    const isExported = (statement: ts.Statement, name: string): boolean =>
      // Top-level declarations of a script are globals
      !isModule || hasExportModifier(statement) || exportedNames.has(name);

    for (const statement of sourceFile.statements) {
      const found = matchDefinition(statement);
      if (!found) continue;

      const start = parseComments ? leadingCommentStart(sourceFile, statement) : statement.getStart(sourceFile);
      const end = statement.getEnd();
      const previous = definitions[definitions.length - 1];

      if (
        found.kind === 'function' &&
        previous?.isOverload &&
        previous.kind === 'function' &&
        previous.name === found.nameNode.text
      ) {
        previous.end = end;
        previous.isOverload = found.isOverload;
        previous.isExported = previous.isExported || isExported(statement, previous.name);
        continue;
      }

      const { line } = sourceFile.getLineAndCharacterOfPosition(statement.getStart(sourceFile));
      definitions.push({
        name: found.nameNode.text,
        nameNode: found.nameNode,
        kind: found.kind,
        filepath: file.filepath,
        start,
        end,
        line: line + 1,
        usages: [],
        isExported: isExported(statement, found.nameNode.text),
        isOverload: found.isOverload,
      });
    }

    return definitions;
  }
}

interface DefinitionMatch {
  nameNode: ts.Identifier;
  kind: DefinitionKind;
  isOverload: boolean;
}

/** Recognize a top-level statement that declares a function or class */
function matchDefinition(statement: ts.Statement): DefinitionMatch | null {
  if (ts.isFunctionDeclaration(statement) && statement.name) {
    return { nameNode: statement.name, kind: 'function', isOverload: !statement.body };
  }

  if (ts.isClassDeclaration(statement) && statement.name) {
    return { nameNode: statement.name, kind: 'class', isOverload: false };
  }

  // const handler = () => {} / const handler = function () {}
  if (ts.isVariableStatement(statement)) {
    const declarations = statement.declarationList.declarations;
    if (declarations.length !== 1) return null;
    const [decl] = declarations;
    if (
      ts.isIdentifier(decl.name) &&
      decl.initializer &&
      (ts.isArrowFunction(decl.initializer) || ts.isFunctionExpression(decl.initializer))
    ) {
      return { nameNode: decl.name, kind: 'function', isOverload: false };
    }
  }

  return null;
}

// Comments that govern the whole file rather than the declaration below them
const FILE_DIRECTIVE = /^\/\/\/\s*<|@ts-(?:no)?check\b|eslint-disable(?!-next-line|-line)|@jsx(?:Frag|ImportSource|Runtime)?\b/;

/**
 * Start of the comment block attached to a statement. Comments separated from
 * the declaration (or from each other) by a blank line stay in the file, and
 * the block never reaches past a file directive.
 */
function leadingCommentStart(sourceFile: ts.SourceFile, statement: ts.Statement): number {
  const text = sourceFile.getFullText();
  let start = statement.getStart(sourceFile);
  const comments = ts.getLeadingCommentRanges(text, statement.getFullStart()) ?? [];

  for (let i = comments.length - 1; i >= 0; i--) {
    const gap = text.slice(comments[i].end, start);
    if ((gap.match(/\n/g) || []).length > 1) break;
    if (FILE_DIRECTIVE.test(text.slice(comments[i].pos, comments[i].end))) break;
    start = comments[i].pos;
  }
  return start;
}

function toDefinition(sourceFile: ts.SourceFile) {
  const text = sourceFile.getFullText();
  return (extracted: ExtractedDefinition): Definition => ({
    name: extracted.name,
    kind: extracted.kind,
    filepath: extracted.filepath,
    sourceText: text.slice(extracted.start, extracted.end),
    start: extracted.start,
    end: extracted.end,
    line: extracted.line,
    usages: extracted.usages,
    isExported: extracted.isExported,
  });
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  if (fileName.endsWith('.tsx')) return ts.ScriptKind.TSX;
  if (fileName.endsWith('.jsx')) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/.test(fileName)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}
